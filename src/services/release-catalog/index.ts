export type {
  Artifact,
  AssetSelection,
  Release,
  ReleaseCatalog,
  SelectionOutcome,
} from "./types";
export { GitHubReleaseCatalog, type GitHubReleaseCatalogOptions } from "./github-release-catalog";
export { ReleaseResolver, type ReleaseResolverOptions } from "./release-resolver";
export { selectArtifacts, matchesPlatform, OS_ALIASES, ARCH_ALIASES } from "./asset-selector";
