import type { Logger } from 'pino';

import type { CloseReason } from '../domain/models.js';
import { positionKeyId } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';

export type TradeNotification =
  | {
      kind: 'PositionOpened';
      userId: string;
      positionKey: string;
      symbol: string;
      sizeUsd: number;
      entryPrice: number;
      availableCapital: number;
    }
  | {
      kind: 'PositionClosed';
      userId: string;
      positionKey: string;
      symbol: string;
      reason: CloseReason;
      exitPrice: number;
      /** Fraction, e.g. -0.15. */
      realizedRoi: number;
      pnlUsd: number;
      capital: number;
    };

/** Delivery is best-effort; a throwing sink is reported on the bus and ignored. */
export interface NotificationSink {
  notify(notification: TradeNotification): void | Promise<void>;
}

/** Forwards position events from the bus to `sink`. Returns a detach function. */
export function attachNotificationSink(eventBus: EventBus, sink: NotificationSink): () => void {
  const offOpened = eventBus.on('position.opened', async ({ userId, position, availableCapital }) => {
    await sink.notify({
      kind: 'PositionOpened',
      userId,
      positionKey: positionKeyId(position.key),
      symbol: position.symbol,
      sizeUsd: position.sizeUsd,
      entryPrice: position.entryPrice,
      availableCapital
    });
  });

  const offClosed = eventBus.on('position.closed', async ({ userId, position, realizedRoi, capital }) => {
    await sink.notify({
      kind: 'PositionClosed',
      userId,
      positionKey: positionKeyId(position.key),
      symbol: position.symbol,
      reason: position.closeReason,
      exitPrice: position.exitPrice,
      realizedRoi,
      pnlUsd: position.pnlUsd,
      capital
    });
  });

  return () => {
    offOpened();
    offClosed();
  };
}

/** Writes notifications to the log; the default when no chat front end is wired. */
export class LoggerNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  notify(notification: TradeNotification): void {
    this.logger.info({ notification }, `notify ${notification.kind}`);
  }
}
