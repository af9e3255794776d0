/**
 * CLI Commands - Public API
 */

export {
  executeValidateCommand,
  renderBatch,
  parseNetworkFlag,
  type ValidateCommandDeps,
  type ValidateCommandOptions,
  type NetworkFlag,
} from './validate.js';
export {
  executeCheckFileCommand,
  parseAddressList,
  type CheckFileCommandDeps,
  type CheckFileCommandOptions,
} from './check-file.js';
