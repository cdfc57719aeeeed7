export {
  CellSequence,
  SlotSequence,
  createCellRef,
  rowOffsets,
  columnOffsets,
  noOffsets,
} from './sequences.js';
export type { CellAccess } from './sequences.js';
