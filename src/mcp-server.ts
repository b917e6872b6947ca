#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config.js';
import { TaskStore } from './task-store.js';
import { TaskService } from './task-service.js';
import { handleToolCall, tools } from './tools.js';
import { colors, log, logError, logHeader } from './logger.js';

const config = loadConfig();

// Создание MCP сервера
function createServer(taskService: TaskService): Server {
  const server = new Server(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Обработчик списка инструментов
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  // Обработчик вызова инструментов
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(taskService, name, args, new Date());
  });

  return server;
}

// Запуск сервера
async function main() {
  logHeader(`${config.serverName} ${config.serverVersion}`);
  log(`Загрузка задач из ${config.tasksFile}...`, colors.yellow);
  const store = TaskStore.open(config.tasksFile);
  log(`Загружено задач: ${store.size}`, colors.green);

  const server = createServer(new TaskService(store));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`${config.serverName} запущен`, colors.green);
}

main().catch((error: unknown) => {
  logError('Не удалось запустить сервер', error);
  process.exit(1);
});
