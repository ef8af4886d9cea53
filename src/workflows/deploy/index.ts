export { classify, describeChanges, type DiffInput } from './diff-engine';
export {
  buildGraph,
  chainNodes,
  plan,
  planChain,
  topologicalOrder,
  validateGraph,
  type ChainInput,
  type DeploymentGraph,
} from './resource-graph';
export { DigestResolver, knownDigest, type DigestResolverOptions } from './digest-resolver';
export {
  ServiceReconciler,
  toDeploymentError,
  type ReconcileContext,
  type ServiceReconcilerOptions,
} from './service-reconciler';
export {
  DeploymentWorkflow,
  type ChainOutcome,
  type ChainOutputs,
  type DeploymentMode,
  type DeploymentRequest,
  type DeploymentResult,
  type DeploymentWorkflowDeps,
  type StepRecord,
} from './deployment-workflow';
