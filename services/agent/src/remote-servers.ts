/**
 * Remote Tool Server Manager — connects MCP servers and keeps their tools in
 * the agent's ToolCollection.
 *
 * Every tool a server contributes is registered with the server id as owner.
 * Disconnecting evicts only the names that server contributed and still owns,
 * so a tool that has since been replaced by another owner survives.
 */

import {
  RemoteConnectionError,
  errorMessage,
  logger,
  type RemoteServerDescriptor,
} from '@toolloop/shared';
import type { McpClientManager } from './mcp-client.js';
import { RemoteTool } from './remote-tool.js';
import type { ToolCollection } from './tool-collection.js';

const log = logger.child({ module: 'remote-servers' });

interface RemoteToolServer {
  descriptor: RemoteServerDescriptor;
  toolNames: Set<string>;
}

export interface InitializeReport {
  connected: string[];
  failed: Array<{ id: string; error: RemoteConnectionError }>;
}

export class RemoteToolServerManager {
  private servers = new Map<string, RemoteToolServer>();

  constructor(
    private readonly clients: McpClientManager,
    private readonly tools: ToolCollection,
  ) {}

  /**
   * Connect a server, list its tools and register them.
   * Failures close the session and surface as RemoteConnectionError.
   */
  async connect(descriptor: RemoteServerDescriptor): Promise<string[]> {
    const serverId = descriptor.id;
    if (this.servers.has(serverId)) {
      log.info({ serverId }, 'server already registered, reconnecting');
      await this.disconnect(serverId);
    }

    let remoteTools: RemoteTool[];
    try {
      await this.clients.connect(descriptor);
      const listed = await this.clients.listTools(serverId);
      remoteTools = listed.map((info) => new RemoteTool(serverId, info, this.clients));
    } catch (err) {
      await this.clients.close(serverId);
      throw new RemoteConnectionError(serverId, errorMessage(err), err);
    }

    this.tools.addTools(...remoteTools);
    const toolNames = new Set(remoteTools.map((tool) => tool.name));
    this.servers.set(serverId, { descriptor, toolNames });

    log.info({ serverId, tools: [...toolNames] }, 'remote server connected');
    return [...toolNames];
  }

  /**
   * Close a server's session and evict its tools. Unknown ids are a no-op.
   * Without an id, every server is disconnected.
   */
  async disconnect(serverId?: string): Promise<void> {
    if (serverId === undefined) {
      for (const id of [...this.servers.keys()]) {
        await this.disconnect(id);
      }
      return;
    }

    const server = this.servers.get(serverId);
    if (!server) return;

    this.servers.delete(serverId);
    await this.clients.close(serverId);
    const evicted = this.tools.removeTools(
      (spec) => spec.owner === serverId && server.toolNames.has(spec.name),
    );
    log.info({ serverId, evicted }, 'remote server disconnected');
  }

  /** Connect every descriptor concurrently; one server's failure never blocks another */
  async initializeFromConfig(descriptors: readonly RemoteServerDescriptor[]): Promise<InitializeReport> {
    const unique: RemoteServerDescriptor[] = [];
    const duplicates: string[] = [];
    for (const descriptor of descriptors) {
      if (unique.some((kept) => kept.id === descriptor.id)) {
        duplicates.push(descriptor.id);
      } else {
        unique.push(descriptor);
      }
    }

    const settled = await Promise.allSettled(unique.map((descriptor) => this.connect(descriptor)));

    const report: InitializeReport = { connected: [], failed: [] };
    settled.forEach((outcome, index) => {
      const id = unique[index].id;
      if (outcome.status === 'fulfilled') {
        report.connected.push(id);
        return;
      }
      const error =
        outcome.reason instanceof RemoteConnectionError
          ? outcome.reason
          : new RemoteConnectionError(id, errorMessage(outcome.reason), outcome.reason);
      log.error({ err: error, serverId: id }, 'failed to connect remote server, skipping');
      report.failed.push({ id, error });
    });
    for (const id of duplicates) {
      const error = new RemoteConnectionError(id, 'duplicate server id in configuration');
      log.error({ serverId: id }, 'duplicate server id, keeping the first descriptor');
      report.failed.push({ id, error });
    }

    log.info(
      { connected: report.connected, failed: report.failed.map((f) => f.id), toolCount: this.tools.size },
      'remote servers initialized',
    );
    return report;
  }

  connectedServers(): string[] {
    return [...this.servers.keys()];
  }

  isConnected(serverId: string): boolean {
    return this.servers.has(serverId);
  }
}
