/**
 * Trait Inference MCP Server
 *
 * MCP server exposing the reasoner as tools: evaluate, evaluate-text and
 * check-well-formed.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import {
    InferenceException,
    createGenericError,
    serializeInferenceError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';
import { VERSION } from './version.js';

type ToolHandler = (
    args: Record<string, unknown>,
    container: ServerContainer,
    options?: { onProgress?: (p: number, m: string) => void }
) => unknown;

const toolHandlers: Record<string, ToolHandler> = {
    'evaluate': (args, c, opts) =>
        Handlers.evaluateHandler(args, c.reasoner, opts?.onProgress),

    'evaluate-text': (args, c, opts) =>
        Handlers.evaluateTextHandler(args, c.reasoner, opts?.onProgress),

    'check-well-formed': (args) =>
        Handlers.checkWellFormedHandler(args),
};

/**
 * Create and configure the MCP server
 */
export function createServer(): Server {
    const server = new Server(
        {
            name: 'trait-inference',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    const container = createContainer();

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs || {};

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw createGenericError('UNKNOWN_TOOL', `Unknown tool: ${name}`, { tool: name });
            }

            const progressToken = request.params._meta?.progressToken;
            const onProgress = progressToken !== undefined ? (progress: number, message: string) => {
                server.notification({
                    method: 'notifications/progress',
                    params: {
                        progressToken,
                        progress,
                        message,
                    },
                }).catch(error => {
                    console.error('Failed to send progress notification:', error);
                });
            } : undefined;

            const result = handler(args, container, { onProgress });

            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        } catch (error) {
            if (error instanceof InferenceException) {
                return {
                    content: [
                        {
                            type: 'text',
                            text: JSON.stringify(serializeInferenceError(error.error), null, 2),
                        },
                    ],
                    isError: true,
                };
            }

            const errorMessage = error instanceof Error ? error.message : String(error);
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify({
                            error: errorMessage,
                            type: error instanceof Error ? error.constructor.name : 'Error',
                        }),
                    },
                ],
                isError: true,
            };
        }
    });

    return server;
}

/**
 * Run the MCP server over stdio
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
}
