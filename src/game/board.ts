/**
 * Board graph: nine rooms joined by twelve single-occupant hallways, with
 * secret passages across opposite corners.
 */

import { Room, ROOMS, Suspect, isRoom } from './cards';

export enum Hallway {
  H1 = 'Hallway1',
  H2 = 'Hallway2',
  H3 = 'Hallway3',
  H4 = 'Hallway4',
  H5 = 'Hallway5',
  H6 = 'Hallway6',
  H7 = 'Hallway7',
  H8 = 'Hallway8',
  H9 = 'Hallway9',
  H10 = 'Hallway10',
  H11 = 'Hallway11',
  H12 = 'Hallway12',
}

export type BoardLocation = Room | Hallway;

export const HALLWAYS: readonly Hallway[] = Object.values(Hallway);
export const LOCATIONS: readonly BoardLocation[] = [...ROOMS, ...HALLWAYS];

export const HALLWAY_ENDS: Readonly<Record<Hallway, readonly [Room, Room]>> = {
  [Hallway.H1]: [Room.STUDY, Room.HALL],
  [Hallway.H2]: [Room.HALL, Room.LOUNGE],
  [Hallway.H3]: [Room.STUDY, Room.LIBRARY],
  [Hallway.H4]: [Room.HALL, Room.BILLIARD_ROOM],
  [Hallway.H5]: [Room.LOUNGE, Room.DINING_ROOM],
  [Hallway.H6]: [Room.LIBRARY, Room.BILLIARD_ROOM],
  [Hallway.H7]: [Room.BILLIARD_ROOM, Room.DINING_ROOM],
  [Hallway.H8]: [Room.LIBRARY, Room.CONSERVATORY],
  [Hallway.H9]: [Room.BILLIARD_ROOM, Room.BALLROOM],
  [Hallway.H10]: [Room.DINING_ROOM, Room.KITCHEN],
  [Hallway.H11]: [Room.CONSERVATORY, Room.BALLROOM],
  [Hallway.H12]: [Room.BALLROOM, Room.KITCHEN],
};

export const SECRET_PASSAGES: readonly (readonly [Room, Room])[] = [
  [Room.STUDY, Room.KITCHEN],
  [Room.LOUNGE, Room.CONSERVATORY],
];

export const STARTING_LOCATIONS: Readonly<Record<Suspect, Hallway>> = {
  [Suspect.SCARLET]: Hallway.H2,
  [Suspect.PLUM]: Hallway.H3,
  [Suspect.PEACOCK]: Hallway.H8,
  [Suspect.GREEN]: Hallway.H11,
  [Suspect.WHITE]: Hallway.H12,
  [Suspect.MUSTARD]: Hallway.H5,
};

function buildAdjacency(): ReadonlyMap<BoardLocation, ReadonlySet<BoardLocation>> {
  const adjacency = new Map<BoardLocation, Set<BoardLocation>>();
  for (const location of LOCATIONS) {
    adjacency.set(location, new Set());
  }

  const link = (a: BoardLocation, b: BoardLocation): void => {
    adjacency.get(a)?.add(b);
    adjacency.get(b)?.add(a);
  };

  for (const hallway of HALLWAYS) {
    const [from, to] = HALLWAY_ENDS[hallway];
    link(hallway, from);
    link(hallway, to);
  }
  for (const [from, to] of SECRET_PASSAGES) {
    link(from, to);
  }

  return adjacency;
}

const ADJACENCY = buildAdjacency();

export function isHallway(value: string): value is Hallway {
  return HALLWAYS.some((known) => known === value);
}

export function isBoardLocation(value: string): value is BoardLocation {
  return isRoom(value) || isHallway(value);
}

export function neighborsOf(location: BoardLocation): BoardLocation[] {
  return [...(ADJACENCY.get(location) ?? [])];
}

export function areAdjacent(from: BoardLocation, to: BoardLocation): boolean {
  return ADJACENCY.get(from)?.has(to) ?? false;
}

/**
 * Structural problems with the graph; empty when every hallway joins exactly
 * two rooms and every room can be left.
 */
export function findBoardProblems(): string[] {
  const problems: string[] = [];

  for (const hallway of HALLWAYS) {
    const rooms = neighborsOf(hallway).filter(isRoom);
    if (rooms.length !== 2 || neighborsOf(hallway).length !== 2) {
      problems.push(`${hallway} must join exactly two rooms`);
    }
  }
  for (const room of ROOMS) {
    if (neighborsOf(room).length === 0) {
      problems.push(`${room} has no exit`);
    }
  }

  return problems;
}
