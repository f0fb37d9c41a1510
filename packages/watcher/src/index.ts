/**
 * @autoencoder/watcher
 *
 * Input folder watching for watch mode.
 */

export {
  FolderWatcher,
  createFileFilter,
  type FileFilterOptions,
  type WatcherConfig,
  type WatchEvent,
} from './folderWatcher.js';

export { SerialTrigger } from './serialTrigger.js';
