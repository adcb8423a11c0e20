export { createCredentialResolver, envCredentials, KEY_FILES } from './credential-resolver';
export type { CredentialResolver, CredentialResolverOptions } from './credential-resolver';
