export { registerRunCommand, runWorkflowCommand } from './run.ts';
export { registerValidateCommand, validateWorkflows } from './validate.ts';
export { formatForDisplay, parseInputJson, parseInputs } from './utils.ts';
