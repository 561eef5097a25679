/**
 * @fileoverview Settings exports
 */

export * from './types.js';
export { DEFAULT_SETTINGS } from './defaults.js';
export {
  getSettingsDir,
  getSettingsPath,
  resolveDataPath,
  mergeSettings,
  loadUserSettings,
  loadUserSettingsAsync,
  loadSettings,
  loadSettingsAsync,
  applyEnvOverrides,
  preloadSettings,
  getSettings,
  reloadSettings,
  setSettingsPath,
  clearSettingsCache,
} from './loader.js';
