import type { SpikePolicy, SpikeRule } from './schemas.js';

export function qualifies(rule: SpikeRule, current: number, previous: number | undefined): boolean {
  switch (rule.kind) {
    case 'ratio':
      return previous !== undefined && previous > 0 && current >= rule.ratio * previous;
    case 'threshold':
      return current >= rule.thresholdUsd;
  }
}

export function inCooldown(policy: SpikePolicy, lastTriggeredAt: number, now: number): boolean {
  return policy.cooldownMs > 0 && now - lastTriggeredAt < policy.cooldownMs;
}

export function describePolicy(policy: SpikePolicy): string {
  const rule = policy.rule.kind === 'ratio'
    ? `ratio>=${policy.rule.ratio}x`
    : `threshold>=$${policy.rule.thresholdUsd}`;
  return policy.cooldownMs > 0 ? `${rule}, cooldown ${Math.round(policy.cooldownMs / 1000)}s` : rule;
}
