export { OpenUrlLauncher } from './open-launcher.js';
export { FunctionUrlLauncher } from './function-launcher.js';
