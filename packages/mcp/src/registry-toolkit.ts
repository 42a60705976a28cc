import {
  type McpClientLike,
  type RegisterMcpClientOptions,
  Toolkit
} from '@registry-bridge/core';
import { RegistryMcpClient } from './registry-mcp-client.js';

type Binding = {
  options: RegisterMcpClientOptions;
  detach: () => void;
};

/**
 * Toolkit that re-registers a registry client's tools after each refresh
 */
export class RegistryToolkit extends Toolkit {
  private readonly bindings = new Map<string, Binding>();

  override async registerMcpClient(
    client: McpClientLike,
    options: RegisterMcpClientOptions = {}
  ): Promise<string[]> {
    const names = await super.registerMcpClient(client, options);
    if (client instanceof RegistryMcpClient) {
      this.bind(client, options);
    }
    return names;
  }

  override removeMcpClient(clientName: string): string[] {
    this.unbind(clientName);
    return super.removeMcpClient(clientName);
  }

  isFollowing(clientName: string): boolean {
    return this.bindings.has(clientName);
  }

  private bind(client: RegistryMcpClient, options: RegisterMcpClientOptions): void {
    this.unbind(client.name);
    const detach = client.registerRefreshHook(async (_detail, refreshed) => {
      this.logger.debug(`Refreshing tools of MCP client ${refreshed.name}`);
      await super.registerMcpClient(refreshed, this.bindings.get(refreshed.name)?.options ?? {});
    });
    this.logger.debug(`Following refreshes of MCP client ${client.name}`);
    this.bindings.set(client.name, { options, detach });
  }

  private unbind(clientName: string): void {
    const binding = this.bindings.get(clientName);
    if (binding) {
      binding.detach();
      this.bindings.delete(clientName);
    }
  }
}
