import { randomUUID } from 'crypto';
import type { Task, ListedTask, OperationResult } from './types.js';
import { TaskStore } from './task-store.js';
import { InvalidIndexError, TaskNotFoundError, ValidationError } from './errors.js';
import { formatDueDate, parseDueDate } from './due-date.js';

// Ближайший срок первым; при равных сроках сохраняется порядок добавления
export function sortByDue(tasks: readonly Task[]): Task[] {
  return [...tasks].sort((a, b) => a.due.getTime() - b.due.getTime());
}

// Отсортированный список с номерами от 1; просрочена задача со сроком строго раньше now
export function listTasks(tasks: readonly Task[], now: Date): ListedTask[] {
  const nowTime = now.getTime();
  return sortByDue(tasks).map((task, i) => ({
    displayIndex: i + 1,
    task,
    isOverdue: task.due.getTime() < nowTime,
  }));
}

export function formatTaskLine(entry: ListedTask): string {
  const line = `${entry.displayIndex}. ${entry.task.name} — срок: ${formatDueDate(entry.task.due)}`;
  return entry.isOverdue ? `${line} (просрочено)` : line;
}

// Номер из списка: целое число или строка с целым числом
function parseDisplayIndex(input: number | string): number | null {
  if (typeof input === 'number') {
    return Number.isInteger(input) ? input : null;
  }
  const trimmed = input.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : null;
}

export class TaskService {
  constructor(private readonly store: TaskStore) {}

  // Получить все задачи в порядке добавления
  public getAllTasks(): readonly Task[] {
    return this.store.getAll();
  }

  // Добавить задачу
  public addTask(name: string, dueText: string): OperationResult<Task> {
    const title = name.trim();
    if (!title) {
      return { ok: false, error: new ValidationError('Название задачи не может быть пустым') };
    }

    const due = parseDueDate(dueText);
    if (!due) {
      return {
        ok: false,
        error: new ValidationError('Формат даты не распознан. Используйте YYYY-MM-DD или YYYY-MM-DD HH:MM'),
      };
    }

    const task: Task = { id: randomUUID(), name: title, due };
    this.store.append(task);
    return { ok: true, value: task };
  }

  public listTasks(now: Date): ListedTask[] {
    return listTasks(this.store.getAll(), now);
  }

  // Просроченные задачи с номерами из общего списка
  public getOverdueTasks(now: Date): ListedTask[] {
    return this.listTasks(now).filter(entry => entry.isOverdue);
  }

  // Удалить задачу по номеру в отсортированном списке
  public removeTaskByDisplayIndex(index: number | string): OperationResult<Task> {
    const sorted = sortByDue(this.store.getAll());
    const position = parseDisplayIndex(index);
    if (position === null || position < 1 || position > sorted.length) {
      return { ok: false, error: new InvalidIndexError(index, sorted.length) };
    }

    return this.removeTask(sorted[position - 1].id);
  }

  // Удалить задачу по ID
  public removeTask(id: string): OperationResult<Task> {
    const removed = this.store.remove(id);
    if (!removed) {
      return { ok: false, error: new TaskNotFoundError(id) };
    }
    return { ok: true, value: removed };
  }

  // Удалить все задачи; без подтверждения ничего не делает
  public clearAllTasks(confirmed: boolean): boolean {
    if (!confirmed) {
      return false;
    }
    this.store.clear();
    return true;
  }
}
