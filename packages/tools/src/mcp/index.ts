export * from './protocol.js';
export { McpServer, type McpServerConfig } from './server.js';
export { serveStdio, type StdioTransportOptions } from './stdio.js';
