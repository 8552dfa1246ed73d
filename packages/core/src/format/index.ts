export {
  DueDateStatus,
  formatTimeSpent,
  formatTimeTracking,
  getDueDateStatus,
  formatDueDateLabel,
  roundToTenth,
  getSubtaskStats,
  formatSubtaskProgress,
} from './todo-format.js';
export { formatFileSize, formatAttachmentLine } from './file-format.js';
