export { Inject } from './inject.js';
export { InjectProperty } from './inject-property.js';
export { Abstract, Implements } from './service.js';
