export { getNode, getNodeType, childCount, getField, listPaths, layoutOf } from './navigation';
export type { Path } from './navigation';
export {
  defaultBehaviorTree,
  insertChild,
  fillSlot,
  deleteNode,
  moveNode,
  retypeNode,
  setField,
  removeField,
  editNodeAt,
} from './tree-ops';
export {
  getCommand,
  insertCommand,
  deleteCommand,
  moveCommand,
  retypeCommand,
  setCommandParam,
  removeCommandParam,
} from './command-ops';
export type { CommandPath } from './command-ops';
export { History, DEFAULT_HISTORY_LIMIT } from './history';
export { StatusLog, STATUS_LOG_LIMIT } from './status-log';
export type { StatusLevel, StatusEntry } from './status-log';
export { EditorSession } from './session';
export type { OpenOptions, SessionOptions } from './session';
export {
  documentKind,
  newMobDocument,
  loadMobFile,
  saveMobFile,
  writeMobText,
  createMobFile,
  deleteMobFile,
  collectMobSources,
} from './files';
export type { DocumentKind, CollectedSources } from './files';
export { MobFileError } from './errors';
