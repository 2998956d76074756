export { loadDataset } from './loader.js';
