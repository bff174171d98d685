import type { CloseReason, PositionStatus } from '../domain/models.js';

export type PositionEvent = CloseReason;

/**
 * `open` moves to `closed` on any close trigger; `closed` is terminal.
 * Returns null for a transition that does not exist.
 */
export function nextStatus(current: PositionStatus, event: PositionEvent): PositionStatus | null {
  if (current === 'open') {
    switch (event) {
      case 'takeProfitHit':
      case 'stopLossHit':
      case 'expired':
      case 'signalSwap':
      case 'manual':
        return 'closed';
    }
  }

  return null;
}
