export { GeneratorCatalog } from './catalog.js';
