// Barrel-файл модуля источников.
export { FileFilter, BUILTIN_PATTERNS, toPosixPath } from './file-filter.js';
export type { FileFilterOptions } from './file-filter.js';
export { scanSourceFiles, fileSize, DEFAULT_MAX_FILE_SIZE } from './local.js';
export type { SourceFile, ScanOptions, ScanResult } from './local.js';
export {
  runGit,
  isGitWorkTree,
  listWorkingTreeChanges,
  parseNameStatus,
  parseNullSeparated,
} from './git.js';
export type { GitRunner, WorkingTreeChange } from './git.js';
