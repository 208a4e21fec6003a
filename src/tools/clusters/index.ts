export {
  type CreateClusterInput,
  CreateClusterInputSchema,
  createCluster,
} from "./create";
export {
  type ProjectClustersInput,
  ProjectClustersInputSchema,
  projectClusters,
} from "./project";
