export type { ManifestAdapter, ManifestFormat } from './interface.ts';
export { CargoManifest } from './cargo.ts';
export { NodeManifest } from './node.ts';
export { PyProjectManifest } from './pyproject.ts';
export { DEFAULT_VERSION_FILE, VersionFileManifest } from './version-file.ts';
export { createRegistry, ManifestRegistry } from './factory.ts';
