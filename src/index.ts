/** Library entry point: the services behind each ptx subcommand. */
export { makeCli } from './cli';
export {
  type BuildFlags,
  type BuildModes,
  type BuildReport,
  performBuild,
  type ResolvedTarget,
} from './runner/build';
export { resolveTarget } from './runner/build/resolve';
export { createEngine, XslEngine } from './runner/engine/engine';
export type {
  DiagramRequest,
  EngineRequest,
  TransformEngine,
  WebworkRequest,
} from './runner/engine/types';
export { ExitCode, FatalError } from './runner/errors';
export { findProjectRootSync, MANIFEST_FILE } from './runner/project/locate';
export { findProject, loadProject, pickTarget } from './runner/project/manifest';
export type {
  BuildFormat,
  ManifestTarget,
  Project,
} from './runner/project/types';
export { performPublish } from './runner/publish/service';
export { performInit } from './runner/scaffold/init';
export { performNew } from './runner/scaffold/new';
export { performView, startView } from './runner/view/service';
