import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

/** Width of the description column */
export const TASK_DESCRIPTION_MAX_LENGTH = 1000;

/**
 * TypeORM entity for the `tasks` table
 *
 * `status` is kept as plain text and only narrowed to TaskStatus when the row
 * is mapped into the domain, so a corrupted value surfaces as a mapping error
 * instead of being silently coerced.
 */
@Entity('tasks')
export class TaskEntity {
  /** Auto-incremented primary key */
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: TASK_DESCRIPTION_MAX_LENGTH })
  description!: string;

  /** Name of a TaskStatus member */
  @Column({ type: 'varchar', length: 50 })
  status!: string;
}
