export { loadModelCatalog, parseModelCatalog, CatalogError, DEFAULT_SUMMARY_PROMPT } from './model-catalog';
