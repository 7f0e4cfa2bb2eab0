export { TechnicianDirectory } from './directory.js';
