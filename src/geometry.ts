export const BOX_SIZE = 3;
export const GRID_SIZE = BOX_SIZE * BOX_SIZE;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
