/**
 * TaskRepository against an in-memory SQLite session.
 */

import type { DatabaseSession } from '../src/config/database';
import { ensureSchema } from '../src/db/schema';
import { SqliteDatabase } from '../src/db/sqliteDatabase';
import { isStorableId, MAX_TASK_ID, TaskRepository } from '../src/repositories/taskRepository';

describe('TaskRepository', () => {
  let database: SqliteDatabase;
  let session: DatabaseSession;
  let clock: Date;
  let repo: TaskRepository;

  beforeEach(async () => {
    database = new SqliteDatabase(':memory:');
    await ensureSchema(database);
    await database.withSession(async (s) => {
      session = s;
    });
    clock = new Date('2025-03-01T10:00:00.000Z');
    repo = new TaskRepository(session, () => clock);
  });

  afterEach(async () => {
    await database.close();
  });

  describe('create', () => {
    it('should assign an id and identical timestamps', async () => {
      const task = await repo.create({ title: 'Buy groceries' });

      expect(task).toEqual({
        id: 1,
        title: 'Buy groceries',
        description: null,
        status: 'pending',
        priority: 'medium',
        due_date: null,
        created_at: new Date('2025-03-01T10:00:00.000Z'),
        updated_at: new Date('2025-03-01T10:00:00.000Z'),
      });
    });

    it('should keep supplied optional fields', async () => {
      const task = await repo.create({
        title: 'Ship release',
        description: 'Tag and publish',
        status: 'in_progress',
        priority: 'high',
        due_date: new Date('2025-03-10T00:00:00.000Z'),
      });

      expect(task.description).toBe('Tag and publish');
      expect(task.status).toBe('in_progress');
      expect(task.priority).toBe('high');
      expect(task.due_date).toEqual(new Date('2025-03-10T00:00:00.000Z'));
    });

    it('should never reuse the id of a deleted task', async () => {
      await repo.create({ title: 'first' });
      const second = await repo.create({ title: 'second' });
      await repo.delete(second.id);

      const third = await repo.create({ title: 'third' });

      expect(third.id).toBe(3);
    });
  });

  describe('findById', () => {
    it('should return null for a missing id', async () => {
      expect(await repo.findById(42)).toBeNull();
    });

    it('should return the stored task', async () => {
      const created = await repo.create({ title: 'Read me' });

      expect(await repo.findById(created.id)).toEqual(created);
    });
  });

  describe('findAll', () => {
    it('should return tasks in id order with the total count', async () => {
      for (const title of ['a', 'b', 'c', 'd']) {
        await repo.create({ title });
      }

      const page = await repo.findAll({ offset: 1, limit: 2 });

      expect(page.tasks.map((task) => task.title)).toEqual(['b', 'c']);
      expect(page.total).toBe(4);
    });

    it('should return an empty page past the end', async () => {
      await repo.create({ title: 'only' });

      const page = await repo.findAll({ offset: 5, limit: 10 });

      expect(page.tasks).toEqual([]);
      expect(page.total).toBe(1);
    });
  });

  describe('update', () => {
    it('should apply only the supplied fields and refresh updated_at', async () => {
      const created = await repo.create({ title: 'Draft', description: 'keep me', priority: 'high' });
      clock = new Date('2025-03-01T11:00:00.000Z');

      const updated = await repo.update(created.id, { status: 'completed' });

      expect(updated).toEqual({
        ...created,
        status: 'completed',
        updated_at: new Date('2025-03-01T11:00:00.000Z'),
      });
    });

    it('should move updated_at forward when the clock has not advanced', async () => {
      const created = await repo.create({ title: 'Fast' });

      const updated = await repo.update(created.id, { title: 'Faster' });

      expect(updated?.updated_at).toEqual(new Date('2025-03-01T10:00:00.001Z'));
      expect(updated?.created_at).toEqual(created.created_at);
    });

    it('should refresh updated_at even when no field is supplied', async () => {
      const created = await repo.create({ title: 'Idle' });
      clock = new Date('2025-03-02T00:00:00.000Z');

      const updated = await repo.update(created.id, {});

      expect(updated?.title).toBe('Idle');
      expect(updated?.updated_at).toEqual(new Date('2025-03-02T00:00:00.000Z'));
    });

    it('should clear description and due date on null', async () => {
      const created = await repo.create({
        title: 'Clear',
        description: 'gone soon',
        due_date: new Date('2025-04-01T00:00:00.000Z'),
      });

      const updated = await repo.update(created.id, { description: null, due_date: null });

      expect(updated?.description).toBeNull();
      expect(updated?.due_date).toBeNull();
    });

    it('should return null for a missing id', async () => {
      expect(await repo.update(7, { title: 'nope' })).toBeNull();
    });
  });

  describe('ids outside the id column range', () => {
    it.each([0, -1, MAX_TASK_ID + 1, 1e20])('should report %p as missing without querying the store', async (id) => {
      const query = jest.fn();
      const isolated = new TaskRepository({ query });

      expect(await isolated.findById(id)).toBeNull();
      expect(await isolated.update(id, { title: 'nope' })).toBeNull();
      expect(await isolated.delete(id)).toBe(false);
      expect(query).not.toHaveBeenCalled();
    });

    it('should accept the largest id the column holds', () => {
      expect(isStorableId(MAX_TASK_ID)).toBe(true);
    });
  });

  describe('delete', () => {
    it('should remove the row', async () => {
      const created = await repo.create({ title: 'Doomed' });

      expect(await repo.delete(created.id)).toBe(true);
      expect(await repo.findById(created.id)).toBeNull();
    });

    it('should return false for a missing id', async () => {
      expect(await repo.delete(7)).toBe(false);
    });
  });
});
