/**
 * Human renderer for request outcomes (invoke command).
 */

import type { Outcome } from '../../types/request.js';
import { formatRenderedRequest } from '../../core/request/dry-run.js';
import { BOLD, DIM, GREEN, NC, RED, hRule, outcomeColor, outcomeSymbol } from './colors.js';

export function renderOutcome(outcome: Outcome, quiet: boolean): string {
  const head = `${outcomeColor(outcome.kind)}${outcomeSymbol(outcome.kind)} ${outcome.kind}${NC}`;

  switch (outcome.kind) {
    case 'complete': {
      const body = JSON.stringify(outcome.data, null, 2) ?? '';
      if (quiet) return body;
      const count = Array.isArray(outcome.data) ? `, ${outcome.data.length} item(s)` : '';
      return [
        `${head} ${DIM}HTTP ${outcome.status}, ${outcome.pages} page(s), ${outcome.attempts} attempt(s)${count}${NC}`,
        hRule(),
        body,
      ].join('\n');
    }
    case 'partial-success': {
      const lines = [`${head} ${outcome.detail.message}`];
      for (const item of outcome.items) {
        const mark = item.succeeded ? `${GREEN}ok${NC}  ` : `${RED}err${NC} `;
        const reason = item.succeeded ? '' : ` ${DIM}${item.errorCode ?? ''} ${item.message ?? ''}${NC}`;
        lines.push(`  ${mark}${item.id ?? '-'} ${item.status}${reason}`);
      }
      return lines.join('\n');
    }
    case 'dry-run':
      return quiet ? formatRenderedRequest(outcome.request) : `${head}\n${formatRenderedRequest(outcome.request)}`;
    case 'invalid':
      return [`${head} ${BOLD}${outcome.detail.message}${NC}`, ...outcome.issues.map((i) => `  - ${i}`)].join('\n');
    case 'cancelled':
      return `${head} ${outcome.detail.message} ${DIM}(${outcome.pagesFetched} page(s), ${outcome.itemsFetched} item(s))${NC}`;
    case 'failed':
    case 'authentication': {
      const meta = [
        outcome.reason,
        outcome.detail.code,
        outcome.detail.status !== undefined ? `HTTP ${outcome.detail.status}` : undefined,
      ].filter((p): p is string => p !== undefined);
      return `${head} ${outcome.detail.message} ${DIM}[${meta.join(', ')}]${NC}`;
    }
  }
}
