export type { SecretFormat, SecretStore, SecretStoreFailure } from './types.js';
export { SecretStoreError, toSecretFormat } from './types.js';
export type { SopsCliOptions } from './sops.js';
export { SopsCli, classifySopsFailure } from './sops.js';
