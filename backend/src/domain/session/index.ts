export { identifyClient } from './clientIdentity.js';
