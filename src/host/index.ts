/**
 * @entry Host access
 *
 * Commands, files, key/value config dialects and account databases.
 */

export {
  type CommandResult,
  type RunOptions,
  type CommandRunner,
  resolveCommand,
  createExecaRunner,
  runChecked,
} from './commandRunner.js'
export { readTextFile, writeTextFile, getFileMode, setFileMode, formatMode, parseMode } from './files.js'
export {
  type KeyValueDialect,
  type SetOutcome,
  KeyValueConfig,
  sshdDialect,
  loginDefsDialect,
  sysctlDialect,
} from './keyValueConfig.js'
export { type PasswdEntry, type ShadowEntry, parsePasswd, parseShadow, isLocked } from './accounts.js'
