export type DeliveryMetricsSnapshot = Readonly<{
  totalConnections: number;
  messagesSent: number;
  messagesFailed: number;
}>;

/** Process-lifetime counters; they only grow. */
export type DeliveryMetrics = Readonly<{
  connectionOpened(): void;
  recordWrite(delivered: boolean): void;
  snapshot(): DeliveryMetricsSnapshot;
}>;

export function createDeliveryMetrics(): DeliveryMetrics {
  let totalConnections = 0;
  let messagesSent = 0;
  let messagesFailed = 0;

  return {
    connectionOpened(): void {
      totalConnections += 1;
    },

    recordWrite(delivered: boolean): void {
      if (delivered) messagesSent += 1;
      else messagesFailed += 1;
    },

    snapshot(): DeliveryMetricsSnapshot {
      return { totalConnections, messagesSent, messagesFailed };
    }
  };
}
