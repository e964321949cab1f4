// src/runner/project/types.ts

export const BUILD_FORMATS = ['html', 'latex', 'pdf'] as const;
export type BuildFormat = (typeof BUILD_FORMATS)[number];

export const isBuildFormat = (v: string): v is BuildFormat =>
  BUILD_FORMATS.some((f) => f === v);

export type StringParams = Record<string, string>;

/** Prototype-free map, so keys such as `__proto__` are stored like any other. */
export const emptyParams = (): StringParams => Object.create(null);

/** One `<target>` of project.ptx, with paths as written (relative to root). */
export type ManifestTarget = {
  name: string;
  source?: string;
  outputDir?: string;
  publication?: string;
  /** Raw `<format>` text; validated at build time. */
  format?: string;
  stringParams: StringParams;
};

export type Project = {
  /** Absolute directory holding project.ptx. */
  root: string;
  /** Absolute path of project.ptx. */
  manifestPath: string;
  targets: ManifestTarget[];
};
