import { CreateTasksTable1700000000000 } from './1700000000000-CreateTasksTable';

/** Every migration, in the order they must run */
export const migrations = [CreateTasksTable1700000000000];
