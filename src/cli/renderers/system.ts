/**
 * Human renderers for session, workspace, config and version output.
 */

import { BOLD, DIM, GREEN, NC, RED, YELLOW } from './colors.js';

/** camelCase key to a display label. */
export function formatLabel(key: string): string {
  const spaced = key.replace(/([a-z0-9])([A-Z])/g, '$1 $2');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function displayValue(value: unknown): string {
  if (value === null || value === undefined) return '-';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

// ---------------------------------------------------------------------------
// session / workspace
// ---------------------------------------------------------------------------

export function renderSession(data: Record<string, unknown>, quiet: boolean): string {
  if (data['connected'] === false) {
    return quiet ? '' : `${DIM}Not connected.${NC}`;
  }
  const workspace = data['workspaceName'] ?? data['workspaceId'] ?? null;
  if (quiet) return displayValue(workspace);

  const state = data['stale'] === true ? `${YELLOW}stale${NC}` : `${GREEN}valid${NC}`;
  const lines = [`${BOLD}Session${NC} ${state}`];
  for (const key of ['workspaceId', 'workspaceName', 'accountId', 'issuedAt', 'expiresAt']) {
    lines.push(`  ${DIM}${formatLabel(key)}:${NC} ${displayValue(data[key])}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

export function renderConfig(data: Record<string, unknown>, quiet: boolean): string {
  if ('key' in data) {
    if (quiet) return displayValue(data['value']);
    const source = data['source'] ? ` ${DIM}(${displayValue(data['source'])})${NC}` : '';
    return `${BOLD}${displayValue(data['key'])}${NC} = ${displayValue(data['value'])}${source}`;
  }
  return renderGeneric(data, quiet);
}

// ---------------------------------------------------------------------------
// version
// ---------------------------------------------------------------------------

export function renderVersion(data: Record<string, unknown>, quiet: boolean): string {
  const version = displayValue(data['version']);
  if (quiet) return version;
  return `skyfleet v${version}`;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export function renderErrorLine(message: string, code?: number | string, fix?: string): string {
  const suffix = code !== undefined ? ` (${code})` : '';
  const hint = fix ? `\n  ${DIM}Fix:${NC} ${fix}` : '';
  return `${RED}Error:${NC} ${message}${suffix}${hint}`;
}

// ---------------------------------------------------------------------------
// Generic fallback renderer
// ---------------------------------------------------------------------------

/**
 * Renders data as indented key-value pairs, one level of nesting.
 */
export function renderGeneric(data: Record<string, unknown>, quiet: boolean): string {
  if (quiet) return '';

  const lines: string[] = [];
  for (const [key, val] of Object.entries(data)) {
    if (val === null || val === undefined) continue;

    if (Array.isArray(val)) {
      lines.push(`${BOLD}${formatLabel(key)}:${NC} (${val.length})`);
      for (const item of val.slice(0, 20)) {
        lines.push(`  - ${displayValue(item)}`);
      }
      if (val.length > 20) {
        lines.push(`  ${DIM}... ${val.length - 20} more${NC}`);
      }
    } else if (isRecord(val)) {
      lines.push(`${BOLD}${formatLabel(key)}:${NC}`);
      for (const [subKey, subVal] of Object.entries(val)) {
        lines.push(`  ${DIM}${formatLabel(subKey)}:${NC} ${displayValue(subVal)}`);
      }
    } else {
      lines.push(`${DIM}${formatLabel(key)}:${NC} ${displayValue(val)}`);
    }
  }
  return lines.join('\n');
}
