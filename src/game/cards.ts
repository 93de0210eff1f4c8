/**
 * Card model: the closed universe of suspects, weapons and rooms, plus the
 * case-file draw and the deal.
 */

export enum Suspect {
  SCARLET = 'Miss Scarlet',
  PLUM = 'Prof. Plum',
  PEACOCK = 'Mrs. Peacock',
  GREEN = 'Mr. Green',
  WHITE = 'Mrs. White',
  MUSTARD = 'Col. Mustard',
}

export enum Weapon {
  ROPE = 'Rope',
  LEAD_PIPE = 'Lead Pipe',
  KNIFE = 'Knife',
  WRENCH = 'Wrench',
  CANDLESTICK = 'Candlestick',
  REVOLVER = 'Revolver',
}

export enum Room {
  STUDY = 'Study',
  HALL = 'Hall',
  LOUNGE = 'Lounge',
  LIBRARY = 'Library',
  BILLIARD_ROOM = 'Billiard Room',
  DINING_ROOM = 'Dining Room',
  CONSERVATORY = 'Conservatory',
  BALLROOM = 'Ballroom',
  KITCHEN = 'Kitchen',
}

export type Card =
  | { kind: 'SUSPECT'; name: Suspect }
  | { kind: 'WEAPON'; name: Weapon }
  | { kind: 'ROOM'; name: Room };

export type CardKind = Card['kind'];

export interface CaseFile {
  suspect: Suspect;
  weapon: Weapon;
  room: Room;
}

/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;

export const SUSPECTS: readonly Suspect[] = Object.values(Suspect);
export const WEAPONS: readonly Weapon[] = Object.values(Weapon);
export const ROOMS: readonly Room[] = Object.values(Room);

/** The character whose holder becomes host and whose token starts nearest the hall. */
export const FIRST_SUSPECT = Suspect.SCARLET;

export const suspectCard = (name: Suspect): Card => ({ kind: 'SUSPECT', name });
export const weaponCard = (name: Weapon): Card => ({ kind: 'WEAPON', name });
export const roomCard = (name: Room): Card => ({ kind: 'ROOM', name });

export const ALL_CARDS: readonly Card[] = [
  ...SUSPECTS.map(suspectCard),
  ...WEAPONS.map(weaponCard),
  ...ROOMS.map(roomCard),
];

export function sameCard(a: Card, b: Card): boolean {
  return a.kind === b.kind && a.name === b.name;
}

export function cardKey(card: Card): string {
  return `${card.kind}:${card.name}`;
}

export function caseFileCards(caseFile: CaseFile): Card[] {
  return [suspectCard(caseFile.suspect), weaponCard(caseFile.weapon), roomCard(caseFile.room)];
}

export function isSuspect(value: string): value is Suspect {
  return SUSPECTS.some((known) => known === value);
}

export function isWeapon(value: string): value is Weapon {
  return WEAPONS.some((known) => known === value);
}

export function isRoom(value: string): value is Room {
  return ROOMS.some((known) => known === value);
}

/**
 * Resolve an exact card name. Names are unique across kinds, so the name alone
 * identifies the card.
 */
export function cardFromName(name: string): Card | null {
  if (isSuspect(name)) return suspectCard(name);
  if (isWeapon(name)) return weaponCard(name);
  if (isRoom(name)) return roomCard(name);
  return null;
}

export function shuffle<T>(array: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...array];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function pickOne<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[Math.floor(random() * items.length)];
}

export function drawCaseFile(random: RandomSource = Math.random): CaseFile {
  return {
    suspect: pickOne(SUSPECTS, random),
    weapon: pickOne(WEAPONS, random),
    room: pickOne(ROOMS, random),
  };
}

/**
 * Shuffle every card outside the case file and deal round-robin from seat 0.
 * Returns one hand per seat.
 */
export function dealHands(caseFile: CaseFile, seats: number, random: RandomSource = Math.random): Card[][] {
  if (seats <= 0) {
    throw new RangeError('Cannot deal to an empty table');
  }

  const hidden = caseFileCards(caseFile);
  const deck = shuffle(
    ALL_CARDS.filter((card) => !hidden.some((secret) => sameCard(secret, card))),
    random
  );

  const hands: Card[][] = Array.from({ length: seats }, () => []);
  deck.forEach((card, index) => {
    hands[index % seats].push(card);
  });
  return hands;
}

/**
 * Cards of a hand that match a suggestion, in suspect, weapon, room order.
 */
export function matchingCards(hand: readonly Card[], suspect: Suspect, weapon: Weapon, room: Room): Card[] {
  return [suspectCard(suspect), weaponCard(weapon), roomCard(room)].filter((wanted) =>
    hand.some((held) => sameCard(held, wanted))
  );
}

/**
 * Describe how the case file and hands fail to partition the card universe.
 * An empty list means every card appears exactly once.
 */
export function findConservationProblems(caseFile: CaseFile, hands: readonly (readonly Card[])[]): string[] {
  const counts = new Map<string, number>();
  for (const card of [...caseFileCards(caseFile), ...hands.flat()]) {
    const key = cardKey(card);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const problems: string[] = [];
  for (const card of ALL_CARDS) {
    const seen = counts.get(cardKey(card)) ?? 0;
    if (seen !== 1) {
      problems.push(`${card.name} appears ${seen} times`);
    }
    counts.delete(cardKey(card));
  }
  for (const key of counts.keys()) {
    problems.push(`unknown card ${key}`);
  }
  return problems;
}
