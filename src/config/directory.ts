import { fileURLToPath } from 'node:url';

// <package>/config, from both src/ and dist/.
export const CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

// node-config reads NODE_CONFIG_DIR when it loads, and defaults to <cwd>/config.
process.env.NODE_CONFIG_DIR ??= CONFIG_DIR;
