/**
 * Platform-specific path utilities for pinecone-assistant-mcp
 */

import { join } from 'node:path';
import { platform, homedir, tmpdir } from 'node:os';
import { mkdirSync, existsSync } from 'node:fs';

const APP_DIR = 'pinecone-assistant-mcp';

/**
 * Returns the OS-specific log directory.
 *
 * Precedence:
 * 1. `ASSISTANT_MCP_LOG_DIR` environment variable
 * 2. Platform default:
 *    - Linux: $XDG_STATE_HOME/pinecone-assistant-mcp/logs/ (default: ~/.local/state/...)
 *    - macOS: ~/Library/Logs/pinecone-assistant-mcp/
 *    - Windows: %LOCALAPPDATA%\pinecone-assistant-mcp\logs\
 */
export function getLogDirectory(): string {
  const customDir = process.env['ASSISTANT_MCP_LOG_DIR'];
  if (customDir) {
    return customDir;
  }

  const home = homedir() || tmpdir();

  switch (platform()) {
    case 'linux': {
      const xdgStateHome = process.env['XDG_STATE_HOME'] ?? join(home, '.local', 'state');
      return join(xdgStateHome, APP_DIR, 'logs');
    }

    case 'darwin':
      return join(home, 'Library', 'Logs', APP_DIR);

    case 'win32': {
      const localAppData = process.env['LOCALAPPDATA'] ?? join(home, 'AppData', 'Local');
      return join(localAppData, APP_DIR, 'logs');
    }

    default:
      return join(home, `.${APP_DIR}`, 'logs');
  }
}

/**
 * Ensures the log directory exists. Returns false if it cannot be created.
 */
export function ensureLogDirectory(): boolean {
  const logDir = getLogDirectory();

  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    return true;
  } catch {
    // Caller falls back to silent logging
    return false;
  }
}

export function getMcpServerLogPath(): string {
  return join(getLogDirectory(), 'mcp-server.jsonl');
}

/**
 * Returns the config directory.
 *
 * - Linux: $XDG_CONFIG_HOME/pinecone-assistant-mcp/ (default: ~/.config/...)
 * - Windows: %LOCALAPPDATA%\pinecone-assistant-mcp\
 * - macOS/other: ~/.pinecone-assistant-mcp/
 */
export function getConfigDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const home = homedir() || tmpdir();
  const currentPlatform = platform();

  if (currentPlatform === 'linux') {
    const xdgConfigHome = env['XDG_CONFIG_HOME'] ?? join(home, '.config');
    return join(xdgConfigHome, APP_DIR);
  }

  if (currentPlatform === 'win32') {
    const localAppData = env['LOCALAPPDATA'] ?? join(home, 'AppData', 'Local');
    return join(localAppData, APP_DIR);
  }

  return join(home, `.${APP_DIR}`);
}
