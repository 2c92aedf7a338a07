import type { LikertValue } from './audience-schema.js';

const LIKERT_CONTRIBUTION: Record<LikertValue, number> = {
  '0': 1,
  '1': 0.75,
  '2': 0.5,
  '3': 0.25,
  '4': 0,
};

/**
 * Agreement in percent for one Likert scale: each vote contributes
 * 100 / 75 / 50 / 25 / 0, averaged over all votes and rounded.
 * Returns null when nobody has voted.
 */
export function likertPercentage(votes: ReadonlyMap<string, LikertValue>): number | null {
  if (votes.size === 0) return null;

  let sum = 0;
  for (const value of votes.values()) {
    sum += LIKERT_CONTRIBUTION[value];
  }
  return Math.round((sum / votes.size) * 100);
}

/**
 * In-memory audience state of one presentation: nicknames, Likert votes and
 * free-text answers. Nothing survives a restart.
 */
export class AudienceStore {
  private readonly nicknames: Map<string, string> = new Map();
  private readonly likert: Map<string, Map<string, LikertValue>> = new Map();
  private readonly answers: Map<string, Map<string, string>> = new Map();

  /* ------------------------------------------------------------------ */
  /*  Nicknames                                                         */
  /* ------------------------------------------------------------------ */

  /** Stores (or renames) a nickname and returns the full list. */
  setNickname(uuid: string, user: string): string[] {
    this.nicknames.set(uuid, user);
    return this.listNicknames();
  }

  getNickname(uuid: string): string | undefined {
    return this.nicknames.get(uuid);
  }

  listNicknames(): string[] {
    return Array.from(this.nicknames.values());
  }

  isKnownUser(user: string): boolean {
    for (const name of this.nicknames.values()) {
      if (name === user) return true;
    }
    return false;
  }

  /* ------------------------------------------------------------------ */
  /*  Likert scales                                                     */
  /* ------------------------------------------------------------------ */

  /** Records (or replaces) a user's vote and returns the new percentage. */
  vote(likertId: string, user: string, value: LikertValue): number {
    const votes = this.likert.get(likertId) ?? new Map<string, LikertValue>();
    votes.set(user, value);
    this.likert.set(likertId, votes);
    return likertPercentage(votes) ?? 0;
  }

  percentage(likertId: string): number | null {
    const votes = this.likert.get(likertId);
    return votes ? likertPercentage(votes) : null;
  }

  allVotes(): Record<string, Record<string, LikertValue>> {
    return toRecord(this.likert);
  }

  /* ------------------------------------------------------------------ */
  /*  Answers                                                           */
  /* ------------------------------------------------------------------ */

  /** Records (or replaces) a user's answer and returns all answers to the question. */
  answer(qid: string, user: string, text: string): string[] {
    const byUser = this.answers.get(qid) ?? new Map<string, string>();
    byUser.set(user, text);
    this.answers.set(qid, byUser);
    return Array.from(byUser.values());
  }

  answersFor(qid: string): string[] | null {
    const byUser = this.answers.get(qid);
    return byUser ? Array.from(byUser.values()) : null;
  }

  allAnswers(): Record<string, Record<string, string>> {
    return toRecord(this.answers);
  }
}

function toRecord<T>(source: Map<string, Map<string, T>>): Record<string, Record<string, T>> {
  const result: Record<string, Record<string, T>> = {};
  for (const [key, inner] of source) {
    result[key] = Object.fromEntries(inner);
  }
  return result;
}
