export {
  FirecrestClientImpl,
  createClient,
  createClientFromEnv,
  type FirecrestClient,
  type ClientDependencies,
} from './client.js';
