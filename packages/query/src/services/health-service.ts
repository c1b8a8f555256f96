import { API_VERSION } from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import type { StoreReader } from '@tallyview/store';

import { systemClock, type Clock, type HealthStatus, type SystemMetadata } from './types.ts';

const logger = getLogger('HealthService');

/** Store view the health probe needs: reads plus the last load time. */
export interface HealthProbeTarget extends StoreReader {
  readonly loadedAt: Date | undefined;
}

export class HealthService {
  constructor(
    private readonly store: HealthProbeTarget,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Time a trivial store read. Never throws; a failing read reports unhealthy.
   */
  checkHealth(): HealthStatus {
    const started = performance.now();
    let status: HealthStatus['status'] = 'healthy';
    try {
      this.store.get('health-probe');
    } catch (error) {
      logger.error({ error }, 'Health probe failed');
      status = 'unhealthy';
    }
    return {
      responseTimeMs: Math.max(0, performance.now() - started),
      status,
      timestamp: this.clock(),
    };
  }

  getMetadata(): SystemMetadata {
    const now = this.clock();
    const bounds = this.store.size > 0 ? this.store.dateBounds : undefined;
    return {
      apiVersion: API_VERSION,
      dataLoadDate: this.store.loadedAt ?? now,
      maxDate: bounds?.maxDate ?? now,
      minDate: bounds?.minDate ?? now,
      totalTransactionCount: this.store.size,
    };
  }
}
