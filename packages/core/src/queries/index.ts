// Task queries
export {
  getTaskRecord,
  getActiveTasks,
  insertTask,
  setArchived,
  setTaskStatus,
  setTaskName,
  deleteAllTasks,
  deleteActiveTasksByStatus,
} from './task-queries.js';

// Settings queries
export {
  getSetting,
  setSetting,
  getPreferredBackend,
  setPreferredBackend,
} from './settings-queries.js';
