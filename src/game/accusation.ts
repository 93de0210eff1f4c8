/**
 * Accusation Resolver
 */

import { CaseFile, Room, Suspect, Weapon } from './cards';
import { appendHistory, describePlayer, remainingPlayers, requireTurn, updatePlayer } from './session';
import { advanceTurn } from './turns';
import { RuleResult, SessionPhase, SessionPlayer, SessionState, Standing } from './types';

export type AccusationVerdict =
  | { kind: 'WIN'; caseFile: CaseFile }
  | { kind: 'ELIMINATED'; next: SessionPlayer }
  | { kind: 'TIE'; caseFile: CaseFile };

export interface AccusationOutcome {
  state: SessionState;
  accuser: SessionPlayer;
  verdict: AccusationVerdict;
}

export function isCorrectAccusation(caseFile: CaseFile, suspect: Suspect, weapon: Weapon, room: Room): boolean {
  return caseFile.suspect === suspect && caseFile.weapon === weapon && caseFile.room === room;
}

export function makeAccusation(
  state: SessionState,
  identity: string,
  suspect: Suspect,
  weapon: Weapon,
  room: Room,
  now: number = Date.now()
): RuleResult<AccusationOutcome> {
  const guard = requireTurn(state, identity);
  if (!guard.ok) return guard;

  const { player, index, status } = guard.value;
  const { caseFile } = status;

  if (isCorrectAccusation(caseFile, suspect, weapon, room)) {
    const ended: SessionState = {
      ...state,
      status: { phase: SessionPhase.ENDED, caseFile, outcome: { kind: 'WINNER', winner: player.identity } },
    };
    return {
      ok: true,
      value: {
        state: appendHistory(
          ended,
          `${describePlayer(player)} solved the case: ${suspect} with the ${weapon} in the ${room}`,
          now
        ),
        accuser: player,
        verdict: { kind: 'WIN', caseFile },
      },
    };
  }

  const accuser = { ...player, standing: Standing.ELIMINATED };
  let next = appendHistory(
    updatePlayer(state, identity, () => accuser),
    `${describePlayer(accuser)} made a wrong accusation and is eliminated`,
    now
  );

  if (remainingPlayers(next).length === 0) {
    next = appendHistory(
      { ...next, status: { phase: SessionPhase.ENDED, caseFile, outcome: { kind: 'TIE' } } },
      'Every player has been eliminated. The game ends in a tie',
      now
    );
    return { ok: true, value: { state: next, accuser, verdict: { kind: 'TIE', caseFile } } };
  }

  next = advanceTurn(next, index);
  const holder = next.status.phase === SessionPhase.IN_PROGRESS ? next.players[next.status.turnIndex] : accuser;
  next = appendHistory(next, `It is now ${describePlayer(holder)}'s turn`, now);

  return { ok: true, value: { state: next, accuser, verdict: { kind: 'ELIMINATED', next: holder } } };
}
