export { readConfigFile, isPlainObject } from './loader.js';
