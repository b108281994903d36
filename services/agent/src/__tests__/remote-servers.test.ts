import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import {
  RemoteConnectionError,
  ToolExecutionError,
  type RemoteServerDescriptor,
  type ToolSpec,
} from '@toolloop/shared';
import { McpClientManager, createTransport } from '../mcp-client.js';
import { RemoteToolServerManager } from '../remote-servers.js';
import { sanitizeToolName } from '../remote-tool.js';
import { ToolCollection } from '../tool-collection.js';
import { startFakeRemoteServer, type FakeRemoteServer, type FakeRemoteTool } from './helpers.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function descriptor(id: string): RemoteServerDescriptor {
  return { id, transport: 'stream', endpointOrCommand: `http://localhost:9/${id}`, args: [] };
}

const SERVER_TOOLS: Record<string, FakeRemoteTool[]> = {
  search: [
    { name: 'web.search', handler: (args) => `results for ${String(args.value)}` },
    { name: 'fail', handler: () => { throw new Error('quota exhausted'); } },
  ],
  files: [
    { name: 'read_file', handler: (args) => `contents of ${String(args.value)}` },
    { name: 'list_dir', handler: () => 'a.txt\nb.txt' },
  ],
};

function localSpec(name: string): ToolSpec {
  return {
    name,
    description: `${name} tool`,
    parameters: { type: 'object', properties: {} },
    execute: async () => ({ content: `local ${name}` }),
  };
}

describe('RemoteToolServerManager', () => {
  let started: FakeRemoteServer[];
  let clients: McpClientManager;
  let tools: ToolCollection;
  let manager: RemoteToolServerManager;

  beforeEach(() => {
    started = [];
    clients = new McpClientManager(async (d) => {
      const serverTools = SERVER_TOOLS[d.id];
      if (!serverTools) {
        throw new Error(`connect ECONNREFUSED ${d.endpointOrCommand}`);
      }
      const fake = await startFakeRemoteServer(d.id, serverTools);
      started.push(fake);
      return fake.clientTransport;
    });
    tools = new ToolCollection([localSpec('terminate')]);
    manager = new RemoteToolServerManager(clients, tools);
  });

  afterEach(async () => {
    await manager.disconnect();
  });

  // --- connect ---

  it('registers remote tools with sanitized names and the server as owner', async () => {
    const names = await manager.connect(descriptor('search'));

    expect(names).toEqual(['web_search', 'fail']);
    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate', 'web_search', 'fail']);
    expect(tools.lookup('web_search')?.owner).toBe('search');
    expect(tools.lookup('web_search')?.parameters).toEqual({
      type: 'object',
      properties: { value: { type: 'string' } },
    });
    expect(manager.isConnected('search')).toBe(true);
  });

  it('forwards calls under the advertised remote name', async () => {
    await manager.connect(descriptor('search'));
    const tool = tools.lookup('web_search');

    expect(tool && (await tool.execute({ value: 'otters' }))).toEqual({ content: 'results for otters' });
    expect(started[0].calls).toEqual([{ name: 'web.search', args: { value: 'otters' } }]);
  });

  it('turns a remote error result into ToolExecutionError', async () => {
    await manager.connect(descriptor('search'));
    const tool = tools.lookup('fail');

    await expect(tool?.execute({})).rejects.toThrow(new ToolExecutionError('fail', 'quota exhausted'));
  });

  it('throws RemoteConnectionError for an unreachable server and registers nothing', async () => {
    await expect(manager.connect(descriptor('offline'))).rejects.toBeInstanceOf(RemoteConnectionError);
    await expect(manager.connect(descriptor('offline'))).rejects.toThrow(
      "Failed to connect to remote server 'offline': connect ECONNREFUSED http://localhost:9/offline",
    );
    expect(tools.size).toBe(1);
    expect(manager.isConnected('offline')).toBe(false);
    expect(clients.isConnected('offline')).toBe(false);
  });

  it('reconnecting an id replaces its session and tools', async () => {
    await manager.connect(descriptor('files'));
    await manager.connect(descriptor('files'));

    expect(started).toHaveLength(2);
    expect(manager.connectedServers()).toEqual(['files']);
    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate', 'read_file', 'list_dir']);
  });

  // --- disconnect ---

  it('evicts only the disconnected server tools', async () => {
    await manager.connect(descriptor('search'));
    await manager.connect(descriptor('files'));

    await manager.disconnect('search');

    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate', 'read_file', 'list_dir']);
    expect(manager.connectedServers()).toEqual(['files']);
    expect(clients.isConnected('search')).toBe(false);
  });

  it('keeps a contributed name that another owner has since replaced', async () => {
    await manager.connect(descriptor('files'));
    tools.addTools(localSpec('read_file'));

    await manager.disconnect('files');

    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate', 'read_file']);
    expect(tools.lookup('read_file')?.owner).toBeUndefined();
  });

  it('treats an unknown id as a no-op', async () => {
    await manager.connect(descriptor('files'));
    await manager.disconnect('nope');
    expect(manager.connectedServers()).toEqual(['files']);
    expect(tools.size).toBe(3);
  });

  it('disconnects every server when called without an id', async () => {
    await manager.connect(descriptor('search'));
    await manager.connect(descriptor('files'));

    await manager.disconnect();

    expect(manager.connectedServers()).toEqual([]);
    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate']);
  });

  // --- initializeFromConfig ---

  it('isolates a failing server from the others', async () => {
    const report = await manager.initializeFromConfig([
      descriptor('search'),
      descriptor('offline'),
      descriptor('files'),
    ]);

    expect(report.connected).toEqual(['search', 'files']);
    expect(report.failed.map((f) => f.id)).toEqual(['offline']);
    expect(report.failed[0].error).toBeInstanceOf(RemoteConnectionError);
    expect(tools.has('web_search')).toBe(true);
    expect(tools.has('read_file')).toBe(true);
  });

  it('connects a repeated id once and reports the repeat as failed', async () => {
    const report = await manager.initializeFromConfig([descriptor('files'), descriptor('files')]);

    expect(report.connected).toEqual(['files']);
    expect(report.failed.map((f) => f.error.message)).toEqual([
      "Failed to connect to remote server 'files': duplicate server id in configuration",
    ]);
    expect(started).toHaveLength(1);

    await manager.disconnect();

    expect(started[0].closed).toBe(true);
    expect(clients.isConnected('files')).toBe(false);
    expect(tools.listSpecs().map((t) => t.name)).toEqual(['terminate']);
  });

  // --- session bookkeeping ---

  it('closes the superseded session when one id connects twice at once', async () => {
    await Promise.all([clients.connect(descriptor('files')), clients.connect(descriptor('files'))]);
    expect(started).toHaveLength(2);

    await clients.close('files');

    expect(started.map((s) => s.closed)).toEqual([true, true]);
    expect(clients.isConnected('files')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Transport construction
// ---------------------------------------------------------------------------

describe('createTransport()', () => {
  it('spawns a process server over stdio', () => {
    const transport = createTransport({
      id: 'fs',
      transport: 'process',
      endpointOrCommand: 'mcp-fs',
      args: ['--root', '/tmp'],
    });
    expect(transport).toBeInstanceOf(StdioClientTransport);
  });

  it('defaults stream servers to streamable HTTP', () => {
    expect(createTransport(descriptor('web'))).toBeInstanceOf(StreamableHTTPClientTransport);
  });

  it('uses SSE when the descriptor asks for it', () => {
    const transport = createTransport({ ...descriptor('web'), protocol: 'sse', headers: { 'X-Api-Key': 'test-secret' } });
    expect(transport).toBeInstanceOf(SSEClientTransport);
  });
});

describe('sanitizeToolName()', () => {
  it('replaces characters outside [a-zA-Z0-9_-] and caps length', () => {
    expect(sanitizeToolName('fs/read file')).toBe('fs_read_file');
    expect(sanitizeToolName('x'.repeat(200))).toHaveLength(128);
  });
});
