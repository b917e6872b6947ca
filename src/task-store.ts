import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { randomUUID } from 'crypto';
import { dirname } from 'path';
import { z } from 'zod';
import type { Task, StoredTask } from './types.js';
import { MalformedDataError, StorageError } from './errors.js';
import { deserializeDueDate, serializeDueDate } from './due-date.js';
import { logError } from './logger.js';

// Схема записи в tasks.json; id может отсутствовать в старых файлах
const storedTaskSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().refine(name => name.trim().length > 0, 'name не может быть пустым'),
  due: z.string(),
});

const tasksFileSchema = z.array(z.unknown());

export class TaskStore {
  private readonly tasksFilePath: string;
  private tasks: Task[] = [];

  constructor(tasksFilePath: string) {
    this.tasksFilePath = tasksFilePath;
  }

  // Создать хранилище и загрузить задачи из файла
  public static open(tasksFilePath: string): TaskStore {
    const store = new TaskStore(tasksFilePath);
    store.tasks = store.load();
    return store;
  }

  public get size(): number {
    return this.tasks.length;
  }

  // Загрузка задач из JSON
  public load(): Task[] {
    if (!existsSync(this.tasksFilePath)) {
      return [];
    }

    let raw: string;
    try {
      raw = readFileSync(this.tasksFilePath, 'utf-8');
    } catch (error) {
      throw new StorageError('Не удалось прочитать файл задач', this.tasksFilePath, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new MalformedDataError('некорректный JSON', this.tasksFilePath, undefined, { cause: error });
    }

    const entries = tasksFileSchema.safeParse(data);
    if (!entries.success) {
      throw new MalformedDataError('ожидался массив задач', this.tasksFilePath);
    }

    // Повторный id получает новый, иначе удаление по id заденет не ту задачу
    const seenIds = new Set<string>();
    return entries.data.map((entry, index) => {
      const task = this.toTask(entry, index);
      if (seenIds.has(task.id)) {
        task.id = randomUUID();
      }
      seenIds.add(task.id);
      return task;
    });
  }

  // Сохранение задач: запись во временный файл и переименование
  public save(tasks: readonly Task[]): void {
    const data: StoredTask[] = tasks.map(task => ({
      id: task.id,
      name: task.name,
      due: serializeDueDate(task.due),
    }));
    const tempPath = `${this.tasksFilePath}.tmp`;

    try {
      mkdirSync(dirname(this.tasksFilePath), { recursive: true });
      writeFileSync(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      renameSync(tempPath, this.tasksFilePath);
    } catch (error) {
      this.removeTempFile(tempPath);
      throw new StorageError('Не удалось сохранить файл задач', this.tasksFilePath, error);
    }
  }

  public getAll(): readonly Task[] {
    return [...this.tasks];
  }

  public findById(id: string): Task | undefined {
    return this.tasks.find(t => t.id === id);
  }

  public append(task: Task): void {
    this.commit([...this.tasks, task]);
  }

  // Удалить задачу по ID
  public remove(id: string): Task | undefined {
    const index = this.tasks.findIndex(t => t.id === id);
    if (index === -1) return undefined;

    const removed = this.tasks[index];
    this.commit(this.tasks.filter((_, i) => i !== index));
    return removed;
  }

  public clear(): void {
    this.commit([]);
  }

  // Состояние в памяти меняется только после успешной записи
  private commit(next: Task[]): void {
    this.save(next);
    this.tasks = next;
  }

  // Ошибка очистки не должна подменять исходную ошибку записи
  private removeTempFile(tempPath: string): void {
    if (!existsSync(tempPath)) return;
    try {
      rmSync(tempPath, { force: true });
    } catch (cleanupError) {
      logError(`Не удалось удалить временный файл ${tempPath}`, cleanupError);
    }
  }

  private toTask(entry: unknown, index: number): Task {
    const parsed = storedTaskSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.errors
        .map(issue => `${issue.path.join('.') || 'entry'}: ${issue.message}`)
        .join('; ');
      throw new MalformedDataError(issues, this.tasksFilePath, index);
    }

    const due = deserializeDueDate(parsed.data.due);
    if (!due) {
      throw new MalformedDataError(
        `некорректная дата "${parsed.data.due}"`,
        this.tasksFilePath,
        index
      );
    }

    return {
      id: parsed.data.id ?? randomUUID(),
      name: parsed.data.name,
      due,
    };
  }
}
