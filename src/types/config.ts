/**
 * Configuration types for pinecone-assistant-mcp server
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const LogLevelSchema = z.enum(LOG_LEVELS);

// Longest delay a Node timer accepts; larger values fire after 1 ms
export const MAX_TIMEOUT_MS = 2_147_483_647;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface PineconeConfig {
  apiKey: string;
  assistantHost: string;
  timeoutMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface ServerConfig {
  pinecone: PineconeConfig;
  logging: LoggingConfig;
}

/**
 * Shape of a YAML config file. Every key is optional; the API key is
 * usually supplied through the environment instead.
 */
export const FileConfigSchema = z
  .object({
    pinecone: z
      .object({
        apiKey: z.string().min(1).optional(),
        assistantHost: z.string().url().optional(),
        timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

export const DEFAULT_ASSISTANT_HOST = 'https://prod-1-data.ke.pinecone.io';

export const DEFAULT_CONFIG: Omit<ServerConfig, 'pinecone'> & {
  pinecone: Omit<PineconeConfig, 'apiKey'>;
} = {
  pinecone: {
    assistantHost: DEFAULT_ASSISTANT_HOST,
    timeoutMs: 30000,
  },
  logging: {
    level: 'info',
  },
};
