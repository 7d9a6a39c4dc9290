import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { StructuredLogger } from './logger.js';

export interface RunningStdioServer {
  close(): Promise<void>;
}

/**
 * Serve one MCP client over stdin/stdout. `onClosed` runs once when the
 * client goes away.
 */
export async function startStdioServer(
  server: McpServer,
  logger: StructuredLogger,
  onClosed: () => void
): Promise<RunningStdioServer> {
  const transport = new StdioServerTransport();
  transport.onclose = () => {
    logger.info('stdio_transport_closed');
    onClosed();
  };
  process.stdin.once('end', () => onClosed());

  await server.connect(transport);
  logger.info('stdio_server_started');

  return {
    async close() {
      await server.close();
    },
  };
}
