/**
 * In-memory file system for resolver tests, backed by memfs.
 */

import * as path from 'node:path';
import { Volume } from 'memfs';
import type { ProfileFs } from '../../src/profiles/types.js';

/** Root configuration directory used throughout the tests. */
export const TEST_DIR = '/home/tester/.dcos';

/**
 * File tree description: file path to contents, or `null` for an empty directory.
 */
export type FileTree = Record<string, string | null>;

/**
 * Description of one cluster directory under `<dir>/clusters/`.
 */
export interface ClusterFixture {
  /** Directory name, i.e. the cluster ID. */
  id: string;
  /** Value written to `cluster.name`, if any. */
  name?: string;
  /** Whether to create the `attached` marker. */
  attached?: boolean;
  /** Raw `dcos.toml` contents, replacing the generated ones. */
  toml?: string;
}

/**
 * Builds the file tree for a set of cluster directories.
 *
 * @param clusters - Cluster fixtures.
 * @param dir - Root configuration directory.
 */
export function clusterTree(clusters: ClusterFixture[], dir: string = TEST_DIR): FileTree {
  const tree: FileTree = {};
  for (const cluster of clusters) {
    const clusterDir = path.join(dir, 'clusters', cluster.id);
    const generated =
      cluster.name === undefined
        ? '[core]\ndcos_url = "https://dcos.test"\n'
        : `[core]\ndcos_url = "https://dcos.test"\n\n[cluster]\nname = "${cluster.name}"\n`;
    tree[path.join(clusterDir, 'dcos.toml')] = cluster.toml ?? generated;
    if (cluster.attached === true) {
      tree[path.join(clusterDir, 'attached')] = '';
    }
  }
  return tree;
}

/**
 * Creates a {@link ProfileFs} over an in-memory volume.
 *
 * @param tree - Initial files and directories.
 */
export function createMemoryFs(tree: FileTree = {}): ProfileFs {
  const vol = Volume.fromJSON(tree);

  return {
    readDir: (dirPath) => {
      const names: unknown[] = vol.readdirSync(dirPath);
      return names.map((raw) => {
        const name = String(raw);
        const stats = vol.statSync(path.join(dirPath, name));
        const isDir = stats?.isDirectory() ?? false;
        return { name, isDirectory: () => isDir };
      });
    },
    readFile: (filePath) => String(vol.readFileSync(filePath, 'utf8')),
    exists: (targetPath) => vol.existsSync(targetPath),
  };
}
