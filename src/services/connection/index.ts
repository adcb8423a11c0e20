export { ConnectionRegistry } from './connection-registry';
