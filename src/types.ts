import type { ValidationError } from './errors.js';

// Задача
export interface Task {
  id: string;
  name: string;
  due: Date;  // локальное время, точность до минуты
}

// Запись задачи в tasks.json
export interface StoredTask {
  id: string;
  name: string;
  due: string;  // ISO без смещения: yyyy-MM-ddTHH:mm:ss
}

// Строка отсортированного списка
export interface ListedTask {
  displayIndex: number;  // с 1, пересчитывается при каждом вызове
  task: Task;
  isOverdue: boolean;
}

// Результат операции с проверкой ввода
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };
