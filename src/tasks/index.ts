/**
 * Automation tasks
 */

export {
  switchPythonVersion,
  sortVersionsNumerically,
  parsePyenvVersions,
  findMatchingVersion,
  buildSwitchSteps,
  deactivatedEnv,
  PYTHON_ICON,
} from './python-env/switch-python-version.js';
export type { SwitchStep } from './python-env/switch-python-version.js';
export { ensurePreCommit } from './pre-commit/ensure-pre-commit.js';
