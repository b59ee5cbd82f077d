// api/_lib/services/communicationGaps.ts
import type { CommunicationGap, ScoredMessage } from '../types/riskTypes';
import type { RiskConfig } from './riskConfig';
import { isAdequateLeadershipResponse } from './dismissalAnalyzer';

interface TimeWindow {
  start: number;
  messages: ScoredMessage[];
}

/**
 * Fixed, non-overlapping windows of `windowMs` aligned to the first message:
 * window k covers [t0 + k*W, t0 + (k+1)*W). A window is a gap when a non-leader
 * raised a risk in it and no adequate leadership response arrived in it or in
 * the following `gapGraceWindows` windows.
 */
export class CommunicationGapDetector {
  constructor(private readonly config: Pick<RiskConfig, 'windowMs' | 'gapGraceWindows'>) {}

  private bucket(messages: readonly ScoredMessage[]): Map<number, TimeWindow> {
    const windows = new Map<number, TimeWindow>();
    if (messages.length === 0) return windows;

    const sorted = [...messages].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.index - b.index);
    const t0 = sorted[0].timestamp.getTime();
    const width = this.config.windowMs;

    for (const m of sorted) {
      const k = Math.floor((m.timestamp.getTime() - t0) / width);
      const window = windows.get(k);
      if (window) window.messages.push(m);
      else windows.set(k, { start: t0 + k * width, messages: [m] });
    }
    return windows;
  }

  detect(messages: readonly ScoredMessage[]): CommunicationGap[] {
    const windows = this.bucket(messages);
    const gaps: CommunicationGap[] = [];
    const keys = [...windows.keys()].sort((a, b) => a - b);

    for (const k of keys) {
      const window = windows.get(k);
      if (!window) continue;

      const concerns = window.messages.filter(m => m.containsRiskWord && !m.isLeadership);
      if (concerns.length === 0) continue;

      const leadership: ScoredMessage[] = [];
      for (let g = 0; g <= this.config.gapGraceWindows; g++) {
        leadership.push(...(windows.get(k + g)?.messages.filter(m => m.isLeadership) ?? []));
      }
      if (leadership.some(isAdequateLeadershipResponse)) continue;

      gaps.push({
        windowStart: new Date(window.start),
        windowEnd: new Date(window.start + this.config.windowMs),
        concernedSenders: [...new Set(concerns.map(m => m.sender))].sort(),
        concernIndices: concerns.map(m => m.index),
        responseIndices: leadership.map(m => m.index),
        leadershipResponded: false,
        dismissiveResponse: leadership.length > 0,
      });
    }

    return gaps;
  }
}
