/**
 * Herald — Destination Adapter Contract
 *
 * An adapter either returns an outcome or throws one of the classified
 * publish errors. `success: false` is treated as retryable by the
 * coordinator.
 */

import type { Destination } from '../../types';

export interface PublishOutcome {
  success: boolean;
  externalReference?: string;
  error?: string;
}

export interface Publisher {
  readonly destination: Destination;
  publish(content: string, signal?: AbortSignal): Promise<PublishOutcome>;
  /** Cheap authenticated call used by the `check` command */
  checkConnection(): Promise<boolean>;
}

export type Publishers = Partial<Record<Destination, Publisher>>;
