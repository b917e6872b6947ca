import { resolve } from 'path';

export interface Config {
  // Путь к файлу задач
  tasksFile: string;
  serverName: string;
  serverVersion: string;
}

export const DEFAULT_TASKS_FILE = 'tasks.json';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    tasksFile: resolve(env.TASKS_FILE || DEFAULT_TASKS_FILE),
    serverName: 'due-tasks-mcp-server',
    serverVersion: '1.0.0',
  };
}
