import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TaskStore } from './task-store.js';
import { MalformedDataError, StorageError } from './errors.js';
import type { Task } from './types.js';

describe('TaskStore', () => {
  let dir: string;
  let tasksFile: string;

  const report: Task = { id: 'task-1', name: 'Write report', due: new Date(2026, 1, 5, 14, 30) };
  const bills: Task = { id: 'task-2', name: 'Pay bills', due: new Date(2026, 0, 10, 23, 59) };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'due-tasks-'));
    tasksFile = join(dir, 'tasks.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeTasksFile(content: string) {
    writeFileSync(tasksFile, content, 'utf-8');
  }

  describe('load', () => {
    it('returns an empty list when the file does not exist', () => {
      const store = TaskStore.open(tasksFile);

      expect(store.size).toBe(0);
      expect(store.getAll()).toEqual([]);
      expect(existsSync(tasksFile)).toBe(false);
    });

    it('reads tasks in file order', () => {
      writeTasksFile(JSON.stringify([
        { id: 'task-1', name: 'Write report', due: '2026-02-05T14:30:00' },
        { id: 'task-2', name: 'Pay bills', due: '2026-01-10T23:59:00' },
      ]));

      expect(TaskStore.open(tasksFile).getAll()).toEqual([report, bills]);
    });

    it('assigns ids to entries written without one', () => {
      writeTasksFile(JSON.stringify([{ name: 'Old task', due: '2026-02-05T23:59:00' }]));

      const [task] = TaskStore.open(tasksFile).getAll();

      expect(task.name).toBe('Old task');
      expect(task.due).toEqual(new Date(2026, 1, 5, 23, 59));
      expect(task.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('gives repeated ids a fresh id and keeps the first one', () => {
      writeTasksFile(JSON.stringify([
        { id: 'dup', name: 'Later', due: '2026-03-01T09:00:00' },
        { id: 'dup', name: 'Sooner', due: '2026-01-01T09:00:00' },
      ]));

      const [later, sooner] = TaskStore.open(tasksFile).getAll();

      expect(later.id).toBe('dup');
      expect(sooner.name).toBe('Sooner');
      expect(sooner.id).not.toBe('dup');
    });

    it('fails on invalid JSON', () => {
      writeTasksFile('{not json');

      expect(() => TaskStore.open(tasksFile)).toThrow(MalformedDataError);
    });

    it('fails when the document is not an array', () => {
      writeTasksFile(JSON.stringify({ tasks: [] }));

      expect(() => TaskStore.open(tasksFile)).toThrow(MalformedDataError);
    });

    it('fails on an entry without due instead of dropping it', () => {
      writeTasksFile(JSON.stringify([
        { id: 'task-1', name: 'Write report', due: '2026-02-05T14:30:00' },
        { id: 'task-2', name: 'No deadline' },
      ]));

      let caught: unknown;
      try {
        TaskStore.open(tasksFile);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MalformedDataError);
      expect(caught).toMatchObject({ code: 'MALFORMED_DATA', entryIndex: 1, filePath: tasksFile });
    });

    it('fails on an unparsable due timestamp', () => {
      writeTasksFile(JSON.stringify([{ id: 'task-1', name: 'Write report', due: 'next week' }]));

      expect(() => TaskStore.open(tasksFile)).toThrow(MalformedDataError);
    });

    it('fails on a blank name', () => {
      writeTasksFile(JSON.stringify([{ id: 'task-1', name: '  ', due: '2026-02-05T14:30:00' }]));

      expect(() => TaskStore.open(tasksFile)).toThrow(MalformedDataError);
    });

    it('reports an unreadable path as a storage error', () => {
      mkdirSync(tasksFile);

      expect(() => TaskStore.open(tasksFile)).toThrow(StorageError);
    });
  });

  describe('save', () => {
    it('writes insertion order with local timestamps', () => {
      const store = TaskStore.open(tasksFile);
      store.append(report);
      store.append(bills);

      expect(JSON.parse(readFileSync(tasksFile, 'utf-8'))).toEqual([
        { id: 'task-1', name: 'Write report', due: '2026-02-05T14:30:00' },
        { id: 'task-2', name: 'Pay bills', due: '2026-01-10T23:59:00' },
      ]);
    });

    it('round-trips through a fresh store', () => {
      const store = TaskStore.open(tasksFile);
      store.append(report);

      expect(new TaskStore(tasksFile).load()).toEqual([report]);
    });

    it('leaves no temporary file behind', () => {
      TaskStore.open(tasksFile).append(report);

      expect(existsSync(`${tasksFile}.tmp`)).toBe(false);
    });

    it('creates missing directories', () => {
      const nested = join(dir, 'data', 'tasks.json');
      TaskStore.open(nested).append(report);

      expect(existsSync(nested)).toBe(true);
    });

    it('keeps the collection unchanged when the write fails', () => {
      writeFileSync(join(dir, 'blocker'), '', 'utf-8');
      const store = new TaskStore(join(dir, 'blocker', 'tasks.json'));

      expect(() => store.append(report)).toThrow(StorageError);
      expect(store.size).toBe(0);
    });
  });

  describe('mutations', () => {
    it('removes by id and persists', () => {
      const store = TaskStore.open(tasksFile);
      store.append(report);
      store.append(bills);

      expect(store.remove('task-1')).toEqual(report);
      expect(store.getAll()).toEqual([bills]);
      expect(new TaskStore(tasksFile).load()).toEqual([bills]);
    });

    it('returns undefined for an unknown id without writing', () => {
      const store = TaskStore.open(tasksFile);

      expect(store.remove('missing')).toBeUndefined();
      expect(existsSync(tasksFile)).toBe(false);
    });

    it('clears and persists an empty array', () => {
      const store = TaskStore.open(tasksFile);
      store.append(report);
      store.clear();

      expect(store.size).toBe(0);
      expect(readFileSync(tasksFile, 'utf-8')).toBe('[]');
    });

    it('hands out copies of the collection', () => {
      const store = TaskStore.open(tasksFile);
      store.append(report);

      const snapshot = store.getAll();
      store.append(bills);

      expect(snapshot).toEqual([report]);
      expect(store.findById('task-2')).toEqual(bills);
    });
  });
});
