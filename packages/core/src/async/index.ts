export { delay, withTimeout } from './timing.js';
