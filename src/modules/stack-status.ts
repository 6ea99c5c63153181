/**
 * CloudFormation stack status values
 * Reference: https://docs.aws.amazon.com/AWSCloudFormation/latest/APIReference/API_Stack.html
 */
export enum StackStatus {
  // CREATE statuses
  CREATE_IN_PROGRESS = 'CREATE_IN_PROGRESS',
  CREATE_COMPLETE = 'CREATE_COMPLETE',
  CREATE_FAILED = 'CREATE_FAILED',
  ROLLBACK_IN_PROGRESS = 'ROLLBACK_IN_PROGRESS',
  ROLLBACK_COMPLETE = 'ROLLBACK_COMPLETE',
  ROLLBACK_FAILED = 'ROLLBACK_FAILED',

  // UPDATE statuses
  UPDATE_IN_PROGRESS = 'UPDATE_IN_PROGRESS',
  UPDATE_COMPLETE = 'UPDATE_COMPLETE',
  UPDATE_COMPLETE_CLEANUP_IN_PROGRESS = 'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS',
  UPDATE_FAILED = 'UPDATE_FAILED',
  UPDATE_ROLLBACK_IN_PROGRESS = 'UPDATE_ROLLBACK_IN_PROGRESS',
  UPDATE_ROLLBACK_COMPLETE = 'UPDATE_ROLLBACK_COMPLETE',
  UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS = 'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS',
  UPDATE_ROLLBACK_FAILED = 'UPDATE_ROLLBACK_FAILED',

  // DELETE statuses
  DELETE_IN_PROGRESS = 'DELETE_IN_PROGRESS',
  DELETE_COMPLETE = 'DELETE_COMPLETE',
  DELETE_FAILED = 'DELETE_FAILED',

  // REVIEW statuses
  REVIEW_IN_PROGRESS = 'REVIEW_IN_PROGRESS',

  // IMPORT statuses
  IMPORT_IN_PROGRESS = 'IMPORT_IN_PROGRESS',
  IMPORT_COMPLETE = 'IMPORT_COMPLETE',
  IMPORT_ROLLBACK_IN_PROGRESS = 'IMPORT_ROLLBACK_IN_PROGRESS',
  IMPORT_ROLLBACK_COMPLETE = 'IMPORT_ROLLBACK_COMPLETE',
  IMPORT_ROLLBACK_FAILED = 'IMPORT_ROLLBACK_FAILED',
}

/**
 * How the tracker reacts to a status:
 * - in-progress: keep polling
 * - succeeded: stop, the operation worked
 * - other: stop and look for failure events (rollbacks, failures, anything unknown)
 */
export type StatusClass = 'in-progress' | 'succeeded' | 'other';

const COMPLETE_SUFFIX = '_COMPLETE';
const FAILED_SUFFIX = '_FAILED';

/**
 * Classifies a status reported while waiting on a create or update
 */
export function classifyStackStatus(status: string): StatusClass {
  switch (status) {
    case StackStatus.CREATE_IN_PROGRESS:
    case StackStatus.UPDATE_IN_PROGRESS:
      return 'in-progress';
    case StackStatus.CREATE_COMPLETE:
    case StackStatus.UPDATE_COMPLETE:
    case StackStatus.UPDATE_COMPLETE_CLEANUP_IN_PROGRESS:
      return 'succeeded';
    default:
      return 'other';
  }
}

/**
 * True for any status ending in `_COMPLETE`, including rollbacks and deletes.
 * Assumes all `_COMPLETE` statuses are final and all final statuses end in `_COMPLETE`.
 */
export function isCompleteStatus(status: string): boolean {
  return status.endsWith(COMPLETE_SUFFIX);
}

/**
 * True for resource statuses such as `CREATE_FAILED` or `UPDATE_FAILED`
 */
export function isFailedStatus(status: string): boolean {
  return status.endsWith(FAILED_SUFFIX);
}
