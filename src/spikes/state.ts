import type { DetectorState } from './schemas.js';

/** Per-address detector memory. Lives as long as the detector that owns it. */
export class SpikeStateStore {
  private states = new Map<string, DetectorState>();

  get(address: string): DetectorState | undefined {
    return this.states.get(address);
  }

  ensure(address: string): DetectorState {
    let s = this.states.get(address);
    if (!s) { s = {}; this.states.set(address, s); }
    return s;
  }

  has(address: string): boolean {
    return this.states.has(address);
  }

  get size(): number {
    return this.states.size;
  }
}
