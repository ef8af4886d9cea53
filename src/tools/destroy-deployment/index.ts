export { destroyDeployment } from './tool';
export { destroyDeploymentSchema, type DestroyDeploymentParams } from './schema';
