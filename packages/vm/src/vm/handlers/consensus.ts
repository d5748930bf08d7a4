import { InvalidTransitionError } from '../../errors.js';
import type { ConsensusOp } from '../../opcodes/domains.js';
import type { ConsensusCapability, HandlerTable } from '../capabilities.js';
import {
  ROUND_STATE_CODES,
  approvals,
  castVote,
  commit,
  decide,
  escalate,
  propose,
  reject,
  seal,
  setQuorum,
  timeout,
  veto,
  voteFromCode,
} from '../consensus.js';
import type { ConsensusRound } from '../consensus.js';

/** Stores the new round and reports a state change, if there was one. */
function settle({ stage, book }: ConsensusCapability, before: ConsensusRound, after: ConsensusRound): void {
  stage.effect(() => book.put(after));
  if (before.state === after.state) return;
  const id = after.proposalId;
  switch (after.state) {
    case 'Committed':
      stage.emit({
        type: 'consensus.commit',
        severity: 'info',
        message: `proposal ${id} committed with ${approvals(after)}/${after.quorum} approvals`,
        data: { proposal: id, approvals: approvals(after), quorum: after.quorum },
      });
      break;
    case 'Rejected':
      stage.emit({
        type: 'consensus.reject',
        severity: 'warn',
        message: `proposal ${id} rejected (${after.reason ?? 'unknown'})`,
        data: { proposal: id, reason: after.reason ?? 'unknown' },
      });
      break;
    case 'Escalated':
      stage.emit({
        type: 'consensus.escalate',
        severity: 'warn',
        message: `proposal ${id} escalated to agent ${after.delegate ?? -1}`,
        data: { proposal: id, delegate: after.delegate ?? -1 },
      });
      break;
    default:
      break;
  }
}

export const CONSENSUS_HANDLERS: HandlerTable<ConsensusOp, ConsensusCapability> = {
  C_PROPOSE: ({ registers, stage, book, agentId }, [id, data, quorum]) => {
    if (book.has(id)) throw new InvalidTransitionError(`proposal ${id} already exists`, { proposal: id });
    const round = propose(id, agentId, registers.get(data), quorum);
    stage.effect(() => book.put(round));
    stage.emit({
      type: 'consensus.propose',
      severity: 'info',
      message: `agent ${agentId} proposed ${id} (quorum ${quorum})`,
      data: { proposal: id, proposer: agentId, quorum },
    });
  },
  C_VOTE: (cx, [id, agent, code]) => {
    const vote = voteFromCode(code);
    const round = cx.book.require(id);
    const next = castVote(round, agent, vote);
    cx.stage.emit({
      type: 'consensus.vote',
      severity: 'info',
      message: `agent ${agent} voted ${vote} on ${id}`,
      data: { proposal: id, agent, vote },
    });
    settle(cx, round, next);
  },
  C_QUORUM: (cx, [id, threshold]) => {
    const round = cx.book.require(id);
    settle(cx, round, setQuorum(round, threshold));
  },
  C_COMMIT: (cx, [dst, id]) => {
    const round = cx.book.require(id);
    const next = commit(round);
    cx.stage.setScalar(dst, next.state === 'Committed' ? 1 : 0);
    settle(cx, round, next);
  },
  C_REJECT: (cx, [id]) => {
    const round = cx.book.require(id);
    settle(cx, round, reject(round));
  },
  C_VETO: (cx, [id, agent]) => {
    const round = cx.book.require(id);
    settle(cx, round, veto(round, agent));
  },
  C_TIMEOUT: (cx, [id]) => {
    const round = cx.book.require(id);
    settle(cx, round, timeout(round));
  },
  C_ESCALATE: (cx, [id, delegate]) => {
    const round = cx.book.require(id);
    settle(cx, round, escalate(round, delegate));
  },
  C_DECIDE: (cx, [id, decision]) => {
    const round = cx.book.require(id);
    settle(cx, round, decide(round, decision));
  },
  C_STATUS: ({ stage, book }, [dst, id]) => {
    stage.setScalar(dst, ROUND_STATE_CODES[book.require(id).state]);
  },
  C_TALLY: ({ stage, book }, [dst, id]) => {
    stage.setScalar(dst, approvals(book.require(id)));
  },
  C_SEAL: (cx, [id, baseline]) => {
    const round = cx.book.require(id);
    settle(cx, round, seal(round, cx.registers.requireBaseline(baseline).fingerprintHex()));
  },
  C_VERIFY: ({ registers, stage, book }, [dst, id, baseline]) => {
    const round = book.require(id);
    const b = registers.requireBaseline(baseline);
    const ok = round.seal !== null && b.verify() && round.seal === b.fingerprintHex();
    stage.setScalar(dst, ok ? 1 : 0);
  },
};
