export {
  type ArtifactPlacement,
  type ArtifactQuota,
  type ArtifactSummary,
  artifactQuota,
  placeArtifactsPass,
  REWARD_SHARE,
} from "./artifact-placer";
