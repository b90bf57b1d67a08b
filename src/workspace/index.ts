export { WorkspaceManager, type Workspace } from './manager.js';
