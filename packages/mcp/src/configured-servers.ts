import {
  createSilentLogger,
  errorData,
  type Logger,
  type McpServerBinding,
  type RegisterMcpClientOptions
} from '@registry-bridge/core';
import type { McpConnector } from './connector.js';
import { createRegistryMcpClient, type RegistryMcpClient } from './registry-mcp-client.js';
import type { RegistryToolkit } from './registry-toolkit.js';
import type { McpServerManager } from './server-manager.js';

export type ConfiguredServersOptions = {
  connector?: McpConnector;
  logger?: Logger;
};

export function toRegisterOptions(binding: McpServerBinding): RegisterMcpClientOptions {
  return {
    enableTools: binding.includeTools,
    disableTools: binding.excludeTools,
    groupName: binding.groupName
  };
}

/**
 * Register the tools of `client` with the filter and group of its binding
 */
export async function registerBoundMcpClient(
  toolkit: RegistryToolkit,
  client: RegistryMcpClient,
  binding: McpServerBinding
): Promise<string[]> {
  return toolkit.registerMcpClient(client, toRegisterOptions(binding));
}

/**
 * Create a client for every configured server and register its tools.
 * Servers bound with `delayInitialize` get a client but no connection; the
 * caller registers them through `registerBoundMcpClient` when needed.
 * On failure the clients created so far are closed and the error is rethrown.
 */
export async function registerConfiguredMcpServers(
  toolkit: RegistryToolkit,
  manager: McpServerManager,
  bindings: Record<string, McpServerBinding>,
  options: ConfiguredServersOptions = {}
): Promise<Map<string, RegistryMcpClient>> {
  const logger = options.logger ?? createSilentLogger();
  const clients = new Map<string, RegistryMcpClient>();

  for (const [name, binding] of Object.entries(bindings)) {
    try {
      const client = await createRegistryMcpClient(name, manager, {
        connector: options.connector,
        logger,
        delayInitialize: binding.delayInitialize
      });
      clients.set(name, client);
      if (binding.delayInitialize) {
        logger.debug(`Deferred tool registration of MCP server ${name}`);
        continue;
      }
      const tools = await registerBoundMcpClient(toolkit, client, binding);
      logger.info(`Registered MCP server ${name}`, { toolCount: tools.length });
    } catch (error) {
      logger.error(`Failed to register MCP server ${name}`, errorData(error));
      for (const [created, client] of clients) {
        toolkit.removeMcpClient(created);
        await client.close().catch((closeError: unknown) => {
          logger.warn(`Failed to close MCP client ${created}`, errorData(closeError));
        });
      }
      throw error;
    }
  }

  return clients;
}
