export { default as pipelineRoutes } from './pipeline-routes.js';
export { default as runRoutes } from './run-routes.js';
export { sendPipelineError } from './pipeline-errors.js';
