export type PairSnapshot = {
  pairAddress?: string;
  chainId?: string;
  dexId?: string;
  symbol: string;
  volume5m?: number;
  marketCap?: number;
  priceUsd: number; // 0 when the provider gave nothing usable
  liquidityUsd: number;
};

export type VolumeObservation = {
  address: string;
  symbol: string;
  volume5m?: number;
  marketCap?: number;
  priceUsd: number;
};

export type SpikeRule =
  | { kind: 'ratio'; ratio: number }
  | { kind: 'threshold'; thresholdUsd: number };

export type SpikePolicy = {
  rule: SpikeRule;
  cooldownMs: number; // 0 disables
};

export type DetectorState = {
  previousVolume5m?: number;
  lastTriggeredAt?: number; // ms epoch of the last dispatched alert
};

export type VolumeFormat = 'integer' | 'decimal';

export type AlertEvent = {
  address: string;
  symbol: string;
  volume5m: number;
  volumeText: string;
  marketCap?: number;
  marketCapText: string;
  changePct?: number; // only with a positive previous volume
  priceUsd: number;
  note: string;
  detectedAt: number;
};

export type Evaluation =
  | { kind: 'skipped'; reason: 'no_volume' }
  | { kind: 'quiet'; previous?: number; current: number }
  | { kind: 'suppressed'; previous?: number; current: number; lastTriggeredAt: number }
  | { kind: 'spike'; previous?: number; current: number; alert: AlertEvent };
