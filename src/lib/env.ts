/**
 * Environment variable handling for ICP Prospector
 * All paths come from env vars, with sensible defaults for development
 */

import 'dotenv/config';
import * as path from 'path';
import * as fs from 'fs';

export interface EnvConfig {
  DATA_DIR: string;
  CONFIG_DIR: string;
  LOG_DIR: string;
  NODE_ENV: string;
  GOOGLE_PLACES_API_KEY?: string;
  OPENAI_API_KEY?: string;
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function getEnvConfig(): EnvConfig {
  const defaultBase = process.env.HOME || process.env.USERPROFILE || '/var/lib/icp-prospector';
  const base = path.join(defaultBase, '.icp-prospector');

  return {
    DATA_DIR: process.env.DATA_DIR || path.join(base, 'data'),
    CONFIG_DIR: process.env.CONFIG_DIR || path.join(base, 'config'),
    LOG_DIR: process.env.LOG_DIR || path.join(base, 'logs'),
    NODE_ENV: process.env.NODE_ENV || 'development',
    GOOGLE_PLACES_API_KEY: process.env.GOOGLE_PLACES_API_KEY || undefined,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY || undefined,
  };
}

export const env = getEnvConfig();
