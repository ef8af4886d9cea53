export { previewDeployment } from './tool';
export { previewDeploymentSchema, type PreviewDeploymentParams } from './schema';
