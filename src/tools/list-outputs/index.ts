export { listOutputs, type DeploymentOutput } from './tool';
export { listOutputsSchema, type ListOutputsParams } from './schema';
