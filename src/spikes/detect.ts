import { SpikeStateStore } from './state.js';
import { qualifies, inCooldown } from './policy.js';
import { changePct, formatCompact, spikeNote, NO_VALUE } from '../ui.js';
import type { AlertEvent, Evaluation, SpikePolicy, VolumeFormat, VolumeObservation } from './schemas.js';

export type DetectorOptions = {
  policy: SpikePolicy;
  volumeFormat?: VolumeFormat;
  store?: SpikeStateStore;
};

function usableVolume(o: VolumeObservation): number | undefined {
  const v = o.volume5m;
  return v !== undefined && Number.isFinite(v) && v > 0 ? v : undefined;
}

/**
 * Classifies 5m volume observations per address.
 *
 * The stored volume is replaced before classification, so the comparison
 * always runs against the previous cycle that carried data. Suppressed and
 * quiet observations still move the baseline forward; only a dispatched
 * spike moves the cooldown clock.
 */
export class SpikeDetector {
  readonly policy: SpikePolicy;
  readonly volumeFormat: VolumeFormat;
  readonly store: SpikeStateStore;

  constructor(opts: DetectorOptions) {
    this.policy = opts.policy;
    this.volumeFormat = opts.volumeFormat ?? 'integer';
    this.store = opts.store ?? new SpikeStateStore();
  }

  /** Warm-up: remember the volume, never alert. */
  seed(o: VolumeObservation): boolean {
    const current = usableVolume(o);
    if (current === undefined) return false;
    this.store.ensure(o.address).previousVolume5m = current;
    return true;
  }

  evaluate(o: VolumeObservation, now = Date.now()): Evaluation {
    const current = usableVolume(o);
    if (current === undefined) return { kind: 'skipped', reason: 'no_volume' };

    const state = this.store.ensure(o.address);
    const previous = state.previousVolume5m;
    state.previousVolume5m = current;

    if (!qualifies(this.policy.rule, current, previous)) return { kind: 'quiet', previous, current };
    const last = state.lastTriggeredAt;
    if (last !== undefined && inCooldown(this.policy, last, now)) {
      return { kind: 'suppressed', previous, current, lastTriggeredAt: last };
    }
    state.lastTriggeredAt = now;
    return { kind: 'spike', previous, current, alert: this.buildAlert(o, current, previous, now) };
  }

  private buildAlert(o: VolumeObservation, current: number, previous: number | undefined, now: number): AlertEvent {
    const volumeText = formatCompact(current, this.volumeFormat);
    const pct = previous !== undefined && previous > 0 ? changePct(current, previous) : undefined;
    return {
      address: o.address,
      symbol: o.symbol,
      volume5m: current,
      volumeText,
      marketCap: o.marketCap,
      marketCapText: o.marketCap !== undefined ? formatCompact(o.marketCap, this.volumeFormat) : NO_VALUE,
      changePct: pct,
      priceUsd: o.priceUsd,
      note: spikeNote({ changePct: pct, volumeText }),
      detectedAt: now,
    };
  }
}
