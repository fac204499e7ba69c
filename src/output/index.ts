export { writeUpdated, isOutdated } from './write-updated.js';
