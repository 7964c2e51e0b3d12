import { ensureNonNullable } from './typeGuards.ts';

export type CellIndex = number;

export type CellValue = number;

export type HouseType = 'block' | 'column' | 'row';

export const BLOCK_SIZE = 3;
export const GRID_SIZE = BLOCK_SIZE * BLOCK_SIZE;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const MAX_CELL_VALUE = GRID_SIZE;
export const MIN_CELL_VALUE = 1;

const CHAR_CODE_A = 65;

export class House {
  public readonly label: string;

  public constructor(public readonly type: HouseType, public readonly id: number, public readonly cells: readonly CellIndex[]) {
    this.label = type === 'column' ? String.fromCharCode(CHAR_CODE_A + id - 1) : String(id);
  }

  public contains(index: CellIndex): boolean {
    return this.cells.includes(index);
  }

  public toString(): string {
    switch (this.type) {
      case 'block':
        return `Block ${this.label}`;
      case 'column':
        return `Column ${this.label}`;
      case 'row':
        return `Row ${this.label}`;
      default: {
        const exhaustive: never = this.type;
        throw new Error(`Unknown house type: ${String(exhaustive)}`);
      }
    }
  }
}

export function blockOf(index: CellIndex): number {
  return Math.floor(rowOf(index) / BLOCK_SIZE) * BLOCK_SIZE + Math.floor(columnOf(index) / BLOCK_SIZE);
}

export function columnOf(index: CellIndex): number {
  return index % GRID_SIZE;
}

export function rowOf(index: CellIndex): number {
  return Math.floor(index / GRID_SIZE);
}

function buildHouses(type: HouseType, houseOf: (index: CellIndex) => number): House[] {
  const members: CellIndex[][] = Array.from({ length: GRID_SIZE }, () => []);
  for (let index = 0; index < CELL_COUNT; index++) {
    ensureNonNullable(members[houseOf(index)]).push(index);
  }
  return members.map((cells, i) => new House(type, i + 1, cells));
}

export const ROWS: readonly House[] = buildHouses('row', rowOf);
export const COLUMNS: readonly House[] = buildHouses('column', columnOf);
export const BLOCKS: readonly House[] = buildHouses('block', blockOf);
export const HOUSES: readonly House[] = [...ROWS, ...COLUMNS, ...BLOCKS];

export function housesOf(index: CellIndex): readonly [House, House, House] {
  return [
    ensureNonNullable(ROWS[rowOf(index)]),
    ensureNonNullable(COLUMNS[columnOf(index)]),
    ensureNonNullable(BLOCKS[blockOf(index)])
  ];
}

const PEERS: readonly (readonly CellIndex[])[] = Array.from({ length: CELL_COUNT }, (_, index) => {
  const result: CellIndex[] = [];
  for (const house of housesOf(index)) {
    for (const peer of house.cells) {
      if (peer !== index && !result.includes(peer)) {
        result.push(peer);
      }
    }
  }
  return result;
});

/**
 * Row peers first, then column peers, then the block peers not already listed.
 */
export function peersOf(index: CellIndex): readonly CellIndex[] {
  return ensureNonNullable(PEERS[index], `Cell index out of range: ${String(index)}`);
}
