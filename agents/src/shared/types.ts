/**
 * Shared types and interfaces for all agents.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { LogLevel } from './logger.js';

export interface AgentContext {
  timestamp: Date;
}

export interface AgentResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  duration: number;
  context: AgentContext;
}

export interface AgentConfig {
  name: string;
  description: string;
  version: string;
}

export interface Agent<TInput, TOutput> {
  config: AgentConfig;
  inputSchema: ZodType<TInput, ZodTypeDef, unknown>;
  outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;
  execute(input: TInput, context?: Partial<AgentContext>): Promise<AgentResult<TOutput>>;
}

export interface AgentLog {
  timestamp: Date;
  level: LogLevel;
  message: string;
  data?: unknown;
}
