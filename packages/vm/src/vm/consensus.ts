import { DecodeError, InvalidTransitionError } from '../errors.js';

export type RoundState = 'Proposed' | 'Voting' | 'Committed' | 'Escalated' | 'Rejected';
export type Vote = 'approve' | 'reject' | 'abstain';
export type RejectReason = 'explicit' | 'veto' | 'timeout' | 'quorum' | 'decision';

export const ROUND_STATE_CODES: Readonly<Record<RoundState, number>> = {
  Proposed: 0,
  Voting: 1,
  Committed: 2,
  Escalated: 3,
  Rejected: 4,
};

const VOTES: readonly Vote[] = ['approve', 'reject', 'abstain'];

export interface ConsensusRound {
  readonly proposalId: number;
  readonly proposer: number;
  readonly data: number;
  readonly votes: ReadonlyMap<number, Vote>;
  readonly quorum: number;
  readonly state: RoundState;
  readonly reason: RejectReason | null;
  readonly delegate: number | null;
  readonly vetoedBy: number | null;
  /** Baseline fingerprint (hex) the round was sealed against. */
  readonly seal: string | null;
}

export function voteFromCode(code: number): Vote {
  const vote = VOTES[code];
  if (vote === undefined) throw new DecodeError(`unknown vote code ${code}`, { code });
  return vote;
}

export function isTerminal(state: RoundState): boolean {
  return state === 'Committed' || state === 'Rejected';
}

function refuse(round: ConsensusRound, action: string): InvalidTransitionError {
  return new InvalidTransitionError(`proposal ${round.proposalId} is ${round.state}; cannot ${action}`, {
    proposal: round.proposalId,
    state: round.state,
    action,
  });
}

function checkQuorum(threshold: number, proposalId: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new InvalidTransitionError(`quorum for proposal ${proposalId} must be at least 1, got ${threshold}`, {
      proposal: proposalId,
      threshold,
    });
  }
}

function open(round: ConsensusRound, action: string): void {
  if (isTerminal(round.state)) throw refuse(round, action);
}

export function approvals(round: ConsensusRound): number {
  let n = 0;
  for (const vote of round.votes.values()) if (vote === 'approve') n++;
  return n;
}

export function propose(proposalId: number, proposer: number, data: number, quorum: number): ConsensusRound {
  checkQuorum(quorum, proposalId);
  return {
    proposalId,
    proposer,
    data,
    votes: new Map(),
    quorum,
    state: 'Proposed',
    reason: null,
    delegate: null,
    vetoedBy: null,
    seal: null,
  };
}

/** Records (or overwrites) a vote; the round commits the moment approvals reach quorum. */
export function castVote(round: ConsensusRound, agent: number, vote: Vote): ConsensusRound {
  open(round, 'vote');
  if (round.state === 'Escalated') throw refuse(round, 'vote');
  const votes = new Map(round.votes);
  votes.set(agent, vote);
  const next: ConsensusRound = { ...round, votes, state: 'Voting' };
  return approvals(next) >= next.quorum ? { ...next, state: 'Committed' } : next;
}

export function setQuorum(round: ConsensusRound, threshold: number): ConsensusRound {
  open(round, 'change quorum');
  checkQuorum(threshold, round.proposalId);
  const next: ConsensusRound = { ...round, quorum: threshold };
  if (next.state !== 'Escalated' && approvals(next) >= threshold) {
    return { ...next, state: 'Committed' };
  }
  return next;
}

/** Settles an open round by its tally. A settled round is returned unchanged. */
export function commit(round: ConsensusRound): ConsensusRound {
  if (isTerminal(round.state)) return round;
  if (round.state === 'Escalated') throw refuse(round, 'commit before the delegate decides');
  return approvals(round) >= round.quorum
    ? { ...round, state: 'Committed' }
    : { ...round, state: 'Rejected', reason: 'quorum' };
}

export function reject(round: ConsensusRound): ConsensusRound {
  open(round, 'reject');
  return { ...round, state: 'Rejected', reason: 'explicit' };
}

export function veto(round: ConsensusRound, agent: number): ConsensusRound {
  open(round, 'veto');
  return { ...round, state: 'Rejected', reason: 'veto', vetoedBy: agent };
}

export function timeout(round: ConsensusRound): ConsensusRound {
  open(round, 'time out');
  return { ...round, state: 'Rejected', reason: 'timeout' };
}

export function escalate(round: ConsensusRound, delegate: number): ConsensusRound {
  if (round.state !== 'Voting') throw refuse(round, 'escalate');
  return { ...round, state: 'Escalated', delegate };
}

export function decide(round: ConsensusRound, decision: number): ConsensusRound {
  if (round.state !== 'Escalated') throw refuse(round, 'decide');
  return decision === 0
    ? { ...round, state: 'Committed' }
    : { ...round, state: 'Rejected', reason: 'decision' };
}

export function seal(round: ConsensusRound, fingerprint: string): ConsensusRound {
  return { ...round, seal: fingerprint };
}

export class ConsensusBook {
  private rounds = new Map<number, ConsensusRound>();

  has(proposalId: number): boolean {
    return this.rounds.has(proposalId);
  }

  get(proposalId: number): ConsensusRound | undefined {
    return this.rounds.get(proposalId);
  }

  require(proposalId: number): ConsensusRound {
    const round = this.rounds.get(proposalId);
    if (!round) {
      throw new InvalidTransitionError(`no proposal ${proposalId}`, { proposal: proposalId });
    }
    return round;
  }

  put(round: ConsensusRound): void {
    this.rounds.set(round.proposalId, round);
  }

  list(): ConsensusRound[] {
    return [...this.rounds.values()].sort((a, b) => a.proposalId - b.proposalId);
  }

  clear(): void {
    this.rounds.clear();
  }
}
