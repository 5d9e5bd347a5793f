export {
  StaticTokenAuth,
  ClientCredentialsAuth,
  type Authorization,
  type ClientCredentialsOptions,
} from './authorization.js';
