// api/_lib/services/keywordMatcher.ts
import type { KeywordMatch } from '../types/riskTypes';
import { AhoCorasickAutomaton } from '../utils/ahoCorasick';
import { tokenize, isPunctuationMarker } from '../utils/tokenize';
import type { RiskConfig } from './riskConfig';

/**
 * Case-insensitive whole-phrase matcher.
 * Word phrases are matched as token sequences, so "issue" never matches inside "issues";
 * phrases with no word characters ("...") are matched against the raw text.
 */
export class PhraseMatcher {
  private automaton = new AhoCorasickAutomaton<string>();
  private markers: string[] = [];

  constructor(phrases: readonly string[]) {
    for (const phrase of phrases) {
      if (isPunctuationMarker(phrase)) {
        this.markers.push(phrase.trim());
        continue;
      }
      const tokens = tokenize(phrase);
      if (tokens.length > 0) this.automaton.addPattern(tokens, phrase);
    }
  }

  /** Distinct matched phrases in order of first occurrence. */
  findIn(text: string, tokens: string[] = tokenize(text)): string[] {
    const found = new Set<string>();
    for (const hit of this.automaton.search(tokens)) found.add(hit.data);
    for (const marker of this.markers) {
      if (text.includes(marker)) found.add(marker);
    }
    return [...found];
  }

  matches(text: string, tokens?: string[]): boolean {
    return this.findIn(text, tokens).length > 0;
  }

  get size(): number {
    return this.automaton.getStats().patternCount + this.markers.length;
  }
}

export class KeywordMatcher {
  private readonly risk: PhraseMatcher;
  private readonly dismissive: PhraseMatcher;
  private readonly acknowledgment: PhraseMatcher;
  private readonly doubt: PhraseMatcher;
  private readonly leadershipRoles: ReadonlySet<string>;

  constructor(config: RiskConfig) {
    this.risk = new PhraseMatcher(config.riskKeywords);
    this.dismissive = new PhraseMatcher(config.dismissivePatterns);
    this.acknowledgment = new PhraseMatcher(config.acknowledgmentPatterns);
    this.doubt = new PhraseMatcher(config.doubtMarkers);
    this.leadershipRoles = config.leadershipRoles;
  }

  isLeadership(sender: string): boolean {
    return this.leadershipRoles.has(sender);
  }

  match(text: string, sender: string): KeywordMatch {
    const tokens = tokenize(text);
    const riskTerms = this.risk.findIn(text, tokens);
    const dismissiveTerms = this.dismissive.findIn(text, tokens);

    return {
      containsRiskWord: riskTerms.length > 0,
      isDismissive: dismissiveTerms.length > 0,
      isLeadership: this.isLeadership(sender),
      isAcknowledgment: this.acknowledgment.matches(text, tokens),
      expressesDoubt: this.doubt.matches(text, tokens),
      riskTerms,
      dismissiveTerms,
    };
  }
}
