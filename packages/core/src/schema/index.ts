export { tasks } from './tasks.js';
export { settings } from './settings.js';
