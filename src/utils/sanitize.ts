/**
 * Sanitize client-supplied identifiers and resolve loosely typed card and
 * location names
 */

import { BoardLocation, LOCATIONS } from '../game/board';
import { ALL_CARDS, Card } from '../game/cards';

// Identities arrive authenticated; this only bounds what we store and echo.
export const MAX_IDENTITY_LENGTH = 150;
export const MAX_GAME_ID_LENGTH = 64;

const GAME_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export interface SanitizeResult {
  valid: boolean;
  sanitized: string;
  error?: string;
}

export function sanitizeIdentity(input: unknown): SanitizeResult {
  if (typeof input !== 'string') {
    return { valid: false, sanitized: '', error: 'Identity must be a string' };
  }

  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { valid: false, sanitized: '', error: 'Identity cannot be empty' };
  }
  if (trimmed.length > MAX_IDENTITY_LENGTH) {
    return {
      valid: false,
      sanitized: '',
      error: `Identity too long (max ${MAX_IDENTITY_LENGTH} chars)`,
    };
  }
  if (CONTROL_CHARACTERS.test(trimmed)) {
    return { valid: false, sanitized: '', error: 'Identity contains invalid characters' };
  }

  return { valid: true, sanitized: trimmed };
}

export function sanitizeGameId(input: unknown): SanitizeResult {
  if (typeof input !== 'string' && typeof input !== 'number') {
    return { valid: false, sanitized: '', error: 'Game id must be a string' };
  }

  const trimmed = String(input).trim();
  if (trimmed.length === 0 || trimmed.length > MAX_GAME_ID_LENGTH) {
    return { valid: false, sanitized: '', error: `Game id must be 1-${MAX_GAME_ID_LENGTH} chars` };
  }
  if (!GAME_ID_PATTERN.test(trimmed)) {
    return { valid: false, sanitized: '', error: 'Game id contains invalid characters' };
  }

  return { valid: true, sanitized: trimmed };
}

/**
 * Normalize string for comparison (lowercase, remove accents)
 */
export function normalizeString(str: string): string {
  return str
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Comparison key ignoring case, accents, spaces and punctuation, so
 * "prof plum" and "BilliardRoom" resolve.
 */
export function nameKey(str: string): string {
  return normalizeString(str).replace(/[^a-z0-9]/g, '');
}

const CARDS_BY_KEY = new Map<string, Card>(ALL_CARDS.map((card) => [nameKey(card.name), card]));
const LOCATIONS_BY_KEY = new Map<string, BoardLocation>(LOCATIONS.map((location) => [nameKey(location), location]));

export function resolveCardName(input: string): Card | null {
  return CARDS_BY_KEY.get(nameKey(input)) ?? null;
}

export function resolveLocationName(input: string): BoardLocation | null {
  return LOCATIONS_BY_KEY.get(nameKey(input)) ?? null;
}
