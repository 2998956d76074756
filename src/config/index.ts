export {
  CONFIG_DIR,
  CONFIG_FILE,
  loadConfig,
  resolveFrom,
  resolveDatasetPath,
  resolveOutputPaths,
} from './loader.js';
