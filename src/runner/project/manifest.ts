/* src/runner/project/manifest.ts
 * Read project.ptx into typed targets. The manifest is never written here.
 */
import path from 'node:path';

import { ExitCode, FatalError } from '../errors';
import {
  attrOf,
  childElements,
  childText,
  firstChild,
  readXmlFile,
  type XmlNode,
} from '../xml';

import { findProjectRootSync, MANIFEST_FILE } from './locate';
import {
  emptyParams,
  type ManifestTarget,
  type Project,
  type StringParams,
} from './types';

const invalid = (manifestPath: string, why: string): FatalError =>
  new FatalError(
    `invalid project manifest ${manifestPath}: ${why}`,
    ExitCode.InvalidInput,
  );

const readStringParams = (node: XmlNode): StringParams => {
  const out = emptyParams();
  for (const p of childElements(node, 'stringparam')) {
    const key = attrOf(p, 'key')?.trim();
    if (key) out[key] = (attrOf(p, 'value') ?? '').trim();
  }
  return out;
};

const readTarget = (
  node: XmlNode,
  index: number,
  manifestPath: string,
): ManifestTarget => {
  const name = attrOf(node, 'name')?.trim();
  if (!name) {
    throw invalid(
      manifestPath,
      `target #${String(index + 1)} has no name attribute`,
    );
  }
  return {
    name,
    source: childText(node, 'source'),
    outputDir: childText(node, 'output-dir'),
    publication: childText(node, 'publication'),
    format: childText(node, 'format'),
    stringParams: readStringParams(node),
  };
};

/** Load the manifest of the project rooted at `root`. */
export const loadProject = async (root: string): Promise<Project> => {
  const manifestPath = path.join(root, MANIFEST_FILE);
  const doc = await readXmlFile(manifestPath);
  if (doc.rootName !== 'project') {
    throw invalid(
      manifestPath,
      `root element is <${doc.rootName}>, expected <project>`,
    );
  }
  const targetsNode = firstChild(doc.root, 'targets');
  const nodes = targetsNode ? childElements(targetsNode, 'target') : [];
  const targets = nodes.map((n, i) => readTarget(n, i, manifestPath));
  const seen = new Set<string>();
  for (const t of targets) {
    if (seen.has(t.name))
      throw invalid(manifestPath, `duplicate target name "${t.name}"`);
    seen.add(t.name);
  }
  return { root, manifestPath, targets };
};

/** Locate and load the project containing `cwd`; null when there is none. */
export const findProject = async (cwd: string): Promise<Project | null> => {
  const root = findProjectRootSync(cwd);
  return root ? loadProject(root) : null;
};

/** Named target, or the first one when `name` is undefined. */
export const pickTarget = (
  project: Project,
  name?: string,
): ManifestTarget | undefined =>
  name === undefined
    ? project.targets[0]
    : project.targets.find((t) => t.name === name);
