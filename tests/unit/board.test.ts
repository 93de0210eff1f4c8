/**
 * Unit Tests for the Board Graph
 */

import {
  HALLWAYS,
  Hallway,
  LOCATIONS,
  STARTING_LOCATIONS,
  areAdjacent,
  findBoardProblems,
  isBoardLocation,
  isHallway,
  neighborsOf,
} from '../../src/game/board';
import { Room, SUSPECTS } from '../../src/game/cards';

describe('Board', () => {
  it('should have 21 locations', () => {
    expect(LOCATIONS).toHaveLength(21);
    expect(HALLWAYS).toHaveLength(12);
  });

  it('should pass its structural checks', () => {
    expect(findBoardProblems()).toEqual([]);
  });

  it('should join each hallway to exactly its two rooms', () => {
    expect(neighborsOf(Hallway.H1).sort()).toEqual([Room.HALL, Room.STUDY]);
    expect(neighborsOf(Hallway.H7).sort()).toEqual([Room.BILLIARD_ROOM, Room.DINING_ROOM]);
    expect(neighborsOf(Hallway.H12).sort()).toEqual([Room.BALLROOM, Room.KITCHEN]);
  });

  it('should be symmetric', () => {
    for (const from of LOCATIONS) {
      for (const to of neighborsOf(from)) {
        expect(areAdjacent(to, from)).toBe(true);
      }
    }
  });

  it('should link the secret passages', () => {
    expect(areAdjacent(Room.STUDY, Room.KITCHEN)).toBe(true);
    expect(areAdjacent(Room.LOUNGE, Room.CONSERVATORY)).toBe(true);
    expect(areAdjacent(Room.HALL, Room.KITCHEN)).toBe(false);
  });

  it('should never join two rooms except by a passage', () => {
    expect(areAdjacent(Room.STUDY, Room.HALL)).toBe(false);
    expect(neighborsOf(Room.BILLIARD_ROOM).every(isHallway)).toBe(true);
  });

  it('should not treat a location as its own neighbour', () => {
    expect(areAdjacent(Room.HALL, Room.HALL)).toBe(false);
  });

  it('should start every character on a distinct hallway', () => {
    const starts = SUSPECTS.map((s) => STARTING_LOCATIONS[s]);
    expect(new Set(starts).size).toBe(6);
    expect(starts.every(isHallway)).toBe(true);
  });

  it('should recognise location names', () => {
    expect(isBoardLocation('Hallway9')).toBe(true);
    expect(isBoardLocation('Billiard Room')).toBe(true);
    expect(isBoardLocation('Hallway0')).toBe(false);
  });
});
