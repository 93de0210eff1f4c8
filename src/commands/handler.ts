/**
 * Inbound message parser
 *
 * Client payloads are untrusted JSON. They are validated into a closed union
 * of inbound messages; adding a message type is a compile-checked change in
 * both `parseInbound` and `toGameAction`.
 */

import { BoardLocation } from '../game/board';
import { Card, Room, Suspect, Weapon } from '../game/cards';
import { GameAction, GameErrorKind, RuleResult, violation } from '../game/types';
import { resolveCardName, resolveLocationName } from '../utils/sanitize';

export type InboundMessage =
  | { type: 'move'; location: BoardLocation }
  | { type: 'suggest'; suspect: Suspect; weapon: Weapon }
  | { type: 'respond_disprove'; card: Card }
  | { type: 'accuse'; suspect: Suspect; weapon: Weapon; room: Room }
  | { type: 'end_turn' }
  | { type: 'start_game' }
  | { type: 'history' }
  | { type: 'sync' };

export type InboundType = InboundMessage['type'];

/** Requests answered from a snapshot without entering the session queue. */
export type ReadOnlyInbound = Extract<InboundMessage, { type: 'history' | 'sync' }>;
export type MutatingInbound = Exclude<InboundMessage, ReadOnlyInbound>;

export const INBOUND_TYPES: readonly InboundType[] = [
  'move',
  'suggest',
  'respond_disprove',
  'accuse',
  'end_turn',
  'start_game',
  'history',
  'sync',
];

function isInboundType(value: unknown): value is InboundType {
  return typeof value === 'string' && INBOUND_TYPES.some((known) => known === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(payload: Record<string, unknown>, field: string): RuleResult<string> {
  const value = payload[field];
  if (typeof value !== 'string' || value.trim() === '') {
    return violation(GameErrorKind.INVALID_MESSAGE, `Missing field "${field}"`);
  }
  return { ok: true, value };
}

function readCard(payload: Record<string, unknown>, field: string): RuleResult<Card> {
  const raw = readString(payload, field);
  if (!raw.ok) return raw;
  const card = resolveCardName(raw.value);
  if (!card) {
    return violation(GameErrorKind.INVALID_CARD, `Unknown card "${raw.value}"`);
  }
  return { ok: true, value: card };
}

function readSuspect(payload: Record<string, unknown>): RuleResult<Suspect> {
  const card = readCard(payload, 'suspect');
  if (!card.ok) return card;
  if (card.value.kind !== 'SUSPECT') {
    return violation(GameErrorKind.INVALID_CARD, `"${card.value.name}" is not a suspect`);
  }
  return { ok: true, value: card.value.name };
}

function readWeapon(payload: Record<string, unknown>): RuleResult<Weapon> {
  const card = readCard(payload, 'weapon');
  if (!card.ok) return card;
  if (card.value.kind !== 'WEAPON') {
    return violation(GameErrorKind.INVALID_CARD, `"${card.value.name}" is not a weapon`);
  }
  return { ok: true, value: card.value.name };
}

function readRoom(payload: Record<string, unknown>): RuleResult<Room> {
  const card = readCard(payload, 'room');
  if (!card.ok) return card;
  if (card.value.kind !== 'ROOM') {
    return violation(GameErrorKind.INVALID_CARD, `"${card.value.name}" is not a room`);
  }
  return { ok: true, value: card.value.name };
}

/**
 * Validate a raw client payload. Accepts an object or its JSON text.
 */
export function parseInbound(payload: unknown): RuleResult<InboundMessage> {
  let data = payload;
  if (typeof data === 'string') {
    try {
      data = JSON.parse(data);
    } catch {
      return violation(GameErrorKind.INVALID_MESSAGE, 'Message is not valid JSON');
    }
  }

  if (!isRecord(data)) {
    return violation(GameErrorKind.INVALID_MESSAGE, 'Message must be an object');
  }
  const type = data.type;
  if (!isInboundType(type)) {
    return violation(GameErrorKind.INVALID_MESSAGE, `Unknown message type: ${String(type)}`);
  }

  switch (type) {
    case 'move': {
      const raw = readString(data, 'location');
      if (!raw.ok) return raw;
      const location = resolveLocationName(raw.value);
      if (!location) {
        return violation(GameErrorKind.INVALID_MOVE, `Unknown location "${raw.value}"`);
      }
      return { ok: true, value: { type: 'move', location } };
    }

    case 'suggest': {
      const suspect = readSuspect(data);
      if (!suspect.ok) return suspect;
      const weapon = readWeapon(data);
      if (!weapon.ok) return weapon;
      return { ok: true, value: { type: 'suggest', suspect: suspect.value, weapon: weapon.value } };
    }

    case 'respond_disprove': {
      const card = readCard(data, 'card');
      if (!card.ok) return card;
      return { ok: true, value: { type: 'respond_disprove', card: card.value } };
    }

    case 'accuse': {
      const suspect = readSuspect(data);
      if (!suspect.ok) return suspect;
      const weapon = readWeapon(data);
      if (!weapon.ok) return weapon;
      const room = readRoom(data);
      if (!room.ok) return room;
      return {
        ok: true,
        value: { type: 'accuse', suspect: suspect.value, weapon: weapon.value, room: room.value },
      };
    }

    case 'end_turn':
    case 'start_game':
    case 'history':
    case 'sync':
      return { ok: true, value: { type } };
  }
}

export function isReadOnly(message: InboundMessage): message is ReadOnlyInbound {
  return message.type === 'history' || message.type === 'sync';
}

/**
 * Map a validated mutating message onto the session action for `identity`.
 */
export function toGameAction(message: MutatingInbound, identity: string): GameAction {
  switch (message.type) {
    case 'move':
      return { type: 'MOVE', identity, target: message.location };
    case 'suggest':
      return { type: 'SUGGEST', identity, suspect: message.suspect, weapon: message.weapon };
    case 'respond_disprove':
      return { type: 'RESPOND_DISPROVE', identity, card: message.card };
    case 'accuse':
      return { type: 'ACCUSE', identity, suspect: message.suspect, weapon: message.weapon, room: message.room };
    case 'end_turn':
      return { type: 'END_TURN', identity };
    case 'start_game':
      return { type: 'START_GAME', identity };
    default: {
      const unhandled: never = message;
      throw new Error(`Unhandled inbound message ${JSON.stringify(unhandled)}`);
    }
  }
}
