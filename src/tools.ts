import { z } from 'zod';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { formatTaskLine, type TaskService } from './task-service.js';
import { formatDueDate } from './due-date.js';
import type { ListedTask } from './types.js';

// Определение инструментов MCP
export const tools: Tool[] = [
  {
    name: 'add_task',
    description: 'Добавить задачу с названием и сроком (YYYY-MM-DD HH:MM или YYYY-MM-DD, тогда срок 23:59)',
    inputSchema: {
      type: 'object',
      properties: {
        name: {
          type: 'string',
          description: 'Название задачи'
        },
        due: {
          type: 'string',
          description: 'Срок: 2026-02-05 14:30 или 2026-02-05'
        }
      },
      required: ['name', 'due']
    }
  },
  {
    name: 'list_tasks',
    description: 'Получить список задач, отсортированный по сроку (ближайшие первыми), с отметкой просроченных',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },
  {
    name: 'get_overdue_tasks',
    description: 'Получить список просроченных задач',
    inputSchema: {
      type: 'object',
      properties: {}
    }
  },
  {
    name: 'delete_task',
    description: 'Удалить задачу по номеру из list_tasks или по ID',
    inputSchema: {
      type: 'object',
      properties: {
        index: {
          type: ['number', 'string'],
          description: 'Номер задачи в отсортированном списке, начиная с 1'
        },
        id: {
          type: 'string',
          description: 'ID задачи'
        }
      }
    }
  },
  {
    name: 'clear_tasks',
    description: 'Удалить все задачи. Требует confirm: true',
    inputSchema: {
      type: 'object',
      properties: {
        confirm: {
          type: 'boolean',
          description: 'Подтверждение удаления всех задач'
        }
      }
    }
  }
];

const addTaskArgs = z.object({
  name: z.string(),
  due: z.string(),
});

const deleteTaskArgs = z
  .object({
    index: z.union([z.number(), z.string()]).optional(),
    id: z.string().optional(),
  })
  .refine(args => (args.index === undefined) !== (args.id === undefined), {
    message: 'Укажите либо index, либо id',
  });

const clearTasksArgs = z.object({
  confirm: z.boolean().default(false),
});

function text(message: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: message }],
    ...(isError ? { isError: true } : {}),
  };
}

function formatList(entries: ListedTask[], emptyMessage: string): string {
  return entries.length === 0 ? emptyMessage : entries.map(formatTaskLine).join('\n');
}

function formatArgsError(error: z.ZodError): string {
  const details = error.errors
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return `Некорректные аргументы: ${details}`;
}

// Обработчик вызова инструментов
export function handleToolCall(
  service: TaskService,
  name: string,
  args: unknown,
  now: Date
): CallToolResult {
  try {
    switch (name) {
      case 'add_task': {
        const parsed = addTaskArgs.safeParse(args ?? {});
        if (!parsed.success) return text(formatArgsError(parsed.error), true);

        const result = service.addTask(parsed.data.name, parsed.data.due);
        if (!result.ok) return text(result.error.message, true);
        return text(`Задача добавлена: ${result.value.name} — срок: ${formatDueDate(result.value.due)}`);
      }

      case 'list_tasks':
        return text(formatList(service.listTasks(now), 'Нет задач.'));

      case 'get_overdue_tasks':
        return text(formatList(service.getOverdueTasks(now), 'Нет просроченных задач.'));

      case 'delete_task': {
        const parsed = deleteTaskArgs.safeParse(args ?? {});
        if (!parsed.success) return text(formatArgsError(parsed.error), true);

        const { index, id } = parsed.data;
        const result = index !== undefined
          ? service.removeTaskByDisplayIndex(index)
          : service.removeTask(id ?? '');
        if (!result.ok) return text(result.error.message, true);
        return text(`Задача удалена: ${result.value.name}`);
      }

      case 'clear_tasks': {
        const parsed = clearTasksArgs.safeParse(args ?? {});
        if (!parsed.success) return text(formatArgsError(parsed.error), true);

        return service.clearAllTasks(parsed.data.confirm)
          ? text('Все задачи удалены.')
          : text('Отменено.');
      }

      default:
        return text(`Неизвестный инструмент: ${name}`, true);
    }
  } catch (error) {
    return text(`Ошибка: ${error instanceof Error ? error.message : 'Неизвестная ошибка'}`, true);
  }
}
