export type TaskStatus = 'Processing' | 'Completed' | 'Failed';

export interface TaskRow {
  id: string;
  status: TaskStatus;
  logs: string[];
  result_file: string | null;
  error: string | null;
  created_at: Date;
  finished_at: Date | null;
}

/** Read-only copy handed to pollers. */
export type TaskSnapshot = Readonly<Omit<TaskRow, 'logs'>> & {
  readonly logs: readonly string[];
};
