export * from './compute/index.js';
export {
  StatusServiceImpl,
  type StatusService,
  type SystemStatus,
  type DeploymentParameter,
  type DeploymentParameters,
} from './status/service.js';
export {
  UtilitiesServiceImpl,
  type UtilitiesService,
  type FileEntry,
  type ListFilesOptions,
} from './utilities/service.js';
