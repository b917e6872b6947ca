// Базовая ошибка трекера задач
export class TaskError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Ошибка ввода: операция ничего не меняет, вызывающий может переспросить
export class ValidationError extends TaskError {
  constructor(message: string, code: string = 'VALIDATION_ERROR') {
    super(message, code);
  }
}

export class InvalidIndexError extends ValidationError {
  constructor(public readonly input: unknown, count: number) {
    super(
      count === 0
        ? 'Нет задач для удаления'
        : `Некорректный номер задачи: ${String(input)}. Допустимо от 1 до ${count}`,
      'INVALID_INDEX'
    );
  }
}

export class TaskNotFoundError extends ValidationError {
  constructor(public readonly id: string) {
    super(`Задача не найдена: ${id}`, 'TASK_NOT_FOUND');
  }
}

// Файл задач повреждён; автоматического восстановления нет
export class MalformedDataError extends TaskError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly entryIndex?: number,
    options?: { cause?: unknown }
  ) {
    const where = entryIndex === undefined ? filePath : `${filePath} [${entryIndex}]`;
    super(`Повреждённый файл задач (${where}): ${message}`, 'MALFORMED_DATA', options);
  }
}

// Файл не читается или не пишется
export class StorageError extends TaskError {
  constructor(message: string, public readonly filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${message} (${filePath}): ${reason}`, 'STORAGE_ERROR', { cause });
  }
}
