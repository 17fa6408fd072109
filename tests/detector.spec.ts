import { describe, it, expect } from 'vitest';
import { SpikeDetector } from '../src/spikes/detect.js';
import { describePolicy } from '../src/spikes/policy.js';
import type { SpikePolicy, VolumeObservation } from '../src/spikes/schemas.js';

const ADDR = 'So11111111111111111111111111111111111111112';
const OTHER = '0xeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeeee';

const ratio: SpikePolicy = { rule: { kind: 'ratio', ratio: 2 }, cooldownMs: 0 };
const threshold: SpikePolicy = { rule: { kind: 'threshold', thresholdUsd: 100_000 }, cooldownMs: 0 };
const cooldown: SpikePolicy = { rule: { kind: 'threshold', thresholdUsd: 50_000 }, cooldownMs: 3_600_000 };

function obs(volume5m: number | undefined, address = ADDR): VolumeObservation {
  return { address, symbol: 'TEST', volume5m, marketCap: 2_500_000, priceUsd: 0.25 };
}

describe('ratio policy', () => {
  it('never fires without a baseline', () => {
    const d = new SpikeDetector({ policy: ratio });
    const ev = d.evaluate(obs(1_000_000));
    expect(ev.kind).toBe('quiet');
    expect(d.store.get(ADDR)?.previousVolume5m).toBe(1_000_000);
  });

  it('fires at exactly twice the previous volume', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(1000));
    const ev = d.evaluate(obs(2000));
    expect(ev.kind).toBe('spike');
    if (ev.kind === 'spike') {
      expect(ev.previous).toBe(1000);
      expect(ev.alert.changePct).toBe(100);
      expect(ev.alert.note).toBe('5m Vol Spike +100%');
      expect(ev.alert.volumeText).toBe('2.0k');
      expect(ev.alert.marketCapText).toBe('2.5m');
      expect(ev.alert.priceUsd).toBe(0.25);
    }
  });

  it('stays quiet just under twice', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(1000));
    expect(d.evaluate(obs(1999)).kind).toBe('quiet');
  });

  it('reports +200% for 100 -> 300', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(100));
    const ev = d.evaluate(obs(300));
    expect(ev.kind === 'spike' && ev.alert.note).toBe('5m Vol Spike +200%');
  });

  it('compares against the previous cycle, not the running peak', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(1000));
    expect(d.evaluate(obs(3000)).kind).toBe('spike');
    // baseline is now 3000
    expect(d.evaluate(obs(5000)).kind).toBe('quiet');
    expect(d.evaluate(obs(10_000)).kind).toBe('spike');
  });

  it('keeps state per address', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(1000, ADDR));
    expect(d.evaluate(obs(5000, OTHER)).kind).toBe('quiet');
    expect(d.evaluate(obs(2000, ADDR)).kind).toBe('spike');
  });
});

describe('threshold policy', () => {
  it('fires at the threshold and not below', () => {
    const d = new SpikeDetector({ policy: threshold });
    expect(d.evaluate(obs(99_999)).kind).toBe('quiet');
    expect(d.evaluate(obs(100_000, OTHER)).kind).toBe('spike');
  });

  it('notes the volume when there is no baseline', () => {
    const d = new SpikeDetector({ policy: threshold });
    const ev = d.evaluate(obs(100_000));
    expect(ev.kind).toBe('spike');
    if (ev.kind === 'spike') {
      expect(ev.alert.changePct).toBeUndefined();
      expect(ev.alert.note).toBe('5m Vol Spike $100.0k');
    }
  });

  it('includes a negative change when volume fell but is still above threshold', () => {
    const d = new SpikeDetector({ policy: threshold });
    d.evaluate(obs(400_000));
    const ev = d.evaluate(obs(200_000));
    expect(ev.kind === 'spike' && ev.alert.note).toBe('5m Vol Spike -50%');
  });
});

describe('cooldown', () => {
  it('suppresses a second alert inside the window', () => {
    const d = new SpikeDetector({ policy: cooldown });
    expect(d.evaluate(obs(60_000), 0).kind).toBe('spike');
    const ev = d.evaluate(obs(80_000), 1_800_000);
    expect(ev.kind).toBe('suppressed');
    if (ev.kind === 'suppressed') expect(ev.lastTriggeredAt).toBe(0);
    expect(d.evaluate(obs(80_000), 3_599_999).kind).toBe('suppressed');
  });

  it('fires again once the window has passed', () => {
    const d = new SpikeDetector({ policy: cooldown });
    expect(d.evaluate(obs(60_000), 0).kind).toBe('spike');
    expect(d.evaluate(obs(60_000), 3_600_001).kind).toBe('spike');
    expect(d.store.get(ADDR)?.lastTriggeredAt).toBe(3_600_001);
  });

  it('advances the baseline while suppressed', () => {
    const d = new SpikeDetector({ policy: { rule: { kind: 'ratio', ratio: 2 }, cooldownMs: 3_600_000 } });
    d.evaluate(obs(100), 0);
    expect(d.evaluate(obs(300), 1).kind).toBe('spike');
    expect(d.evaluate(obs(900), 2).kind).toBe('suppressed');
    const ev = d.evaluate(obs(1800), 7_200_000);
    expect(ev.kind).toBe('spike');
    if (ev.kind === 'spike') expect(ev.alert.changePct).toBe(100);
  });
});

describe('validity gate and warm-up', () => {
  it('skips missing volume without touching state', () => {
    const d = new SpikeDetector({ policy: ratio });
    expect(d.evaluate(obs(undefined))).toEqual({ kind: 'skipped', reason: 'no_volume' });
    expect(d.store.has(ADDR)).toBe(false);
  });

  it('keeps the last good baseline across gaps', () => {
    const d = new SpikeDetector({ policy: ratio });
    d.evaluate(obs(1000));
    d.evaluate(obs(undefined));
    d.evaluate(obs(0));
    const ev = d.evaluate(obs(2000));
    expect(ev.kind === 'spike' && ev.previous).toBe(1000);
  });

  it('seeds baselines without alerting', () => {
    const d = new SpikeDetector({ policy: threshold });
    expect(d.seed(obs(500_000))).toBe(true);
    expect(d.seed(obs(undefined, OTHER))).toBe(false);
    expect(d.store.size).toBe(1);
    const ev = d.evaluate(obs(500_000));
    expect(ev.kind === 'spike' && ev.alert.note).toBe('5m Vol Spike +0%');
  });

  it('renders decimal small volumes when asked', () => {
    const d = new SpikeDetector({ policy: { rule: { kind: 'threshold', thresholdUsd: 0 }, cooldownMs: 0 }, volumeFormat: 'decimal' });
    const ev = d.evaluate(obs(999));
    expect(ev.kind === 'spike' && ev.alert.volumeText).toBe('999.0');
  });
});

describe('policy description', () => {
  it('summarises rule and cooldown', () => {
    expect(describePolicy(ratio)).toBe('ratio>=2x');
    expect(describePolicy(cooldown)).toBe('threshold>=$50000, cooldown 3600s');
  });
});
