// src/runner/build/index.ts
import { loadCliConfigSync } from '../../cli/config/load';
import { createEngine } from '../engine/engine';
import type { CommandRunner } from '../engine/exec';
import { resolveEngineSettings } from '../engine/settings';
import type { TransformEngine } from '../engine/types';
import { findProject } from '../project/manifest';
import { log } from '../util/log';

import { type BuildFlags, resolveTarget } from './resolve';
import {
  type BuildModes,
  type BuildReport,
  DEFAULT_BUILD_MODES,
  runBuild,
} from './service';

export type { BuildFlags, ResolvedTarget } from './resolve';
export type { BuildModes, BuildReport } from './service';

/**
 * Locate the project, resolve the target and build it.
 *
 * @param cwd - Directory the command runs in.
 * @param flags - Target name and path overrides.
 * @param modes - Asset and dispatch switches.
 * @param inject - Engine/runner replacements (tests).
 */
export const performBuild = async (
  cwd: string,
  flags: BuildFlags,
  modes: Partial<BuildModes> = {},
  inject: { engine?: TransformEngine; runner?: CommandRunner } = {},
): Promise<BuildReport> => {
  const project = await findProject(cwd);
  if (!project) {
    log.warning(
      'No project manifest was found. Run "ptx init" to generate one.',
    );
  }
  const target = resolveTarget(project, cwd, flags);
  const config = loadCliConfigSync(cwd);
  const settings = resolveEngineSettings(config, cwd);
  const engine = inject.engine ?? createEngine(settings, inject.runner);
  return runBuild(
    target,
    { ...DEFAULT_BUILD_MODES, ...modes },
    {
      engine,
      settings,
      webworkServer: config.webwork?.server,
      runner: inject.runner,
    },
  );
};
