// api/_lib/services/dismissalAnalyzer.ts
import { REASON_CODES, type FlaggedMessage, type ReasonCode, type RiskCluster, type ScoredMessage } from '../types/riskTypes';
import type { RiskConfig } from './riskConfig';
import type { SimilarityComponent } from './similarityClusterer';

interface PendingConcern {
  index: number;
  sender: string;
}

interface FoldState {
  pending: PendingConcern[];
  concernRaised: boolean;
  /** Concerns since the last adequate leadership response. */
  unanswered: number;
  tags: Map<number, Set<ReasonCode>>;
  dismissed: Set<number>;
}

export interface DismissalResult {
  clusters: RiskCluster[];
  flaggedMessages: FlaggedMessage[];
  dismissedConcernIndices: number[];
}

/** Leadership message that is neither dismissive nor downplaying. */
export function isAdequateLeadershipResponse(m: ScoredMessage): boolean {
  return m.isLeadership && !m.isDismissive && !m.isDownplaying;
}

function tag(state: FoldState, index: number, reason: ReasonCode): void {
  const set = state.tags.get(index);
  if (set) set.add(reason);
  else state.tags.set(index, new Set([reason]));
}

function sortReasons(reasons: Iterable<ReasonCode>): ReasonCode[] {
  return [...new Set(reasons)].sort((a, b) => REASON_CODES.indexOf(a) - REASON_CODES.indexOf(b));
}

/**
 * One step of the chronological scan over a cluster's members and replies.
 *
 * - an acknowledgment closes the sender's own pending concerns
 * - a dismissal (dismissive phrase, or leadership downplaying) aimed at someone
 *   else's pending concern tags the dismissive message DISMISSED_IN_CLUSTER
 * - an adequate leadership response resets the unanswered-concern run
 * - a non-leader concern while another is unanswered is PERSISTENT_UNACKNOWLEDGED
 * - a non-leader voicing doubt after a concern was raised is CONTINUED_DOUBT
 */
function step(state: FoldState, m: ScoredMessage, isMember: boolean): FoldState {
  if (m.isAcknowledgment) {
    state.pending = state.pending.filter(p => p.sender !== m.sender);
  }

  const isDismissal = m.isDismissive || (m.isLeadership && m.isDownplaying);
  if (isDismissal) {
    const targets = state.pending.filter(p => p.sender !== m.sender);
    if (targets.length > 0) {
      tag(state, m.index, 'DISMISSED_IN_CLUSTER');
      for (const t of targets) state.dismissed.add(t.index);
      state.pending = state.pending.filter(p => p.sender === m.sender);
    }
    return state;
  }

  if (m.isLeadership) {
    state.unanswered = 0;
    return state;
  }

  if (m.isAcknowledgment) return state;

  if (m.expressesDoubt && state.concernRaised) {
    tag(state, m.index, 'CONTINUED_DOUBT');
  }

  if (isMember) {
    if (state.unanswered >= 1) tag(state, m.index, 'PERSISTENT_UNACKNOWLEDGED');
    state.unanswered++;
    state.pending.push({ index: m.index, sender: m.sender });
    state.concernRaised = true;
  }

  return state;
}

export class DismissalAnalyzer {
  constructor(private readonly config: Pick<RiskConfig, 'replyWindowMs'>) {}

  /** Non-risk messages that follow some member within the reply window. */
  collectResponses(messages: readonly ScoredMessage[], memberIndices: readonly number[]): number[] {
    const responses = new Set<number>();
    for (const memberIndex of memberIndices) {
      const start = messages[memberIndex].timestamp.getTime();
      for (let i = memberIndex + 1; i < messages.length; i++) {
        const candidate = messages[i];
        if (candidate.timestamp.getTime() - start > this.config.replyWindowMs) break;
        if (!candidate.containsRiskWord) responses.add(candidate.index);
      }
    }
    return [...responses].sort((a, b) => a - b);
  }

  /**
   * @param messages - every scored message, in index (timestamp) order
   * @param components - similarity clusters over the risk-keyword subset
   */
  analyze(messages: readonly ScoredMessage[], components: readonly SimilarityComponent[]): DismissalResult {
    const clusterTags = new Map<number, { reasons: Set<ReasonCode>; clusterId: number }>();
    const memberOf = new Map<number, number>();
    const allDismissed = new Set<number>();

    const clusters = components.map(component => {
      const members = new Set(component.memberIndices);
      for (const idx of component.memberIndices) memberOf.set(idx, component.id);

      const responseIndices = this.collectResponses(messages, component.memberIndices);
      const sequence = [...component.memberIndices, ...responseIndices].sort((a, b) => a - b);

      const initial: FoldState = { pending: [], concernRaised: false, unanswered: 0, tags: new Map(), dismissed: new Set() };
      const final = sequence.reduce((state, idx) => step(state, messages[idx], members.has(idx)), initial);

      let hasDismissal = false;
      let hasPersistentConcern = false;
      for (const [idx, reasons] of final.tags) {
        if (reasons.has('DISMISSED_IN_CLUSTER')) hasDismissal = true;
        if (reasons.has('PERSISTENT_UNACKNOWLEDGED')) hasPersistentConcern = true;
        const existing = clusterTags.get(idx);
        if (existing) {
          for (const r of reasons) existing.reasons.add(r);
        } else {
          clusterTags.set(idx, { reasons: new Set(reasons), clusterId: component.id });
        }
      }
      for (const idx of final.dismissed) allDismissed.add(idx);

      const first = messages[component.memberIndices[0]];
      const last = messages[component.memberIndices[component.memberIndices.length - 1]];

      const cluster: RiskCluster = {
        id: component.id,
        memberIndices: [...component.memberIndices],
        responseIndices,
        startTime: new Date(first.timestamp.getTime()),
        endTime: new Date(last.timestamp.getTime()),
        hasDismissal,
        hasPersistentConcern,
        dismissedConcernCount: final.dismissed.size,
      };
      return cluster;
    });

    const flaggedMessages: FlaggedMessage[] = [];
    for (const m of messages) {
      const fromCluster = clusterTags.get(m.index);
      if (m.flagReasons.length === 0 && !fromCluster) continue;
      flaggedMessages.push({
        index: m.index,
        timestamp: new Date(m.timestamp.getTime()),
        sender: m.sender,
        channel: m.channel,
        message: m.text,
        reasons: sortReasons([...m.flagReasons, ...(fromCluster?.reasons ?? [])]),
        clusterId: fromCluster?.clusterId ?? memberOf.get(m.index) ?? null,
      });
    }

    flaggedMessages.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.index - b.index);

    return {
      clusters,
      flaggedMessages,
      dismissedConcernIndices: [...allDismissed].sort((a, b) => a - b),
    };
  }
}
