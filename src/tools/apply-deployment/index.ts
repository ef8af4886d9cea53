export { applyDeployment } from './tool';
export { applyDeploymentSchema, type ApplyDeploymentParams } from './schema';
