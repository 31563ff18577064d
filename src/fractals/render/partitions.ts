export interface RenderPartition {
  startX: number;
  startY: number;
  width: number;
  height: number;
}

export type PartitionLayout = "rows" | "tiles";

type TileOptions = {
  preferredNumber: number;
  minSize: number;
  maxSize: number;
};

/**
 * Picks a partition count for a grid: a few partitions per worker so fast bands
 * don't leave workers idle, never more partitions than rows.
 */
export function calculatePartitionCount(height: number, workerCount: number, partitionsPerWorker = 4): number {
  return Math.max(1, Math.min(height, workerCount * partitionsPerWorker));
}

/**
 * Divides a width x height grid into `count` horizontal bands of full width.
 * Band heights differ by at most one row; bands are returned top to bottom.
 */
export function createRowPartitions(width: number, height: number, count: number): RenderPartition[] {
  const bands = Math.max(1, Math.min(height, Math.floor(count)));
  const baseHeight = Math.floor(height / bands);
  const remainder = height % bands;

  const partitions: RenderPartition[] = [];
  let startY = 0;
  for (let i = 0; i < bands; i++) {
    const bandHeight = baseHeight + (i < remainder ? 1 : 0);
    partitions.push({ startX: 0, startY, width, height: bandHeight });
    startY += bandHeight;
  }
  return partitions;
}

/**
 * Divides a grid into square tiles ordered center-out, so a progressive preview
 * fills in from the middle of the image. Edge tiles are clipped to the grid.
 *
 * @param options for the tile size calculation. the defaults are pretty sensible
 */
export function createTilePartitions(
  width: number,
  height: number,
  options: TileOptions = { preferredNumber: 250, minSize: 20, maxSize: 1000 }
): RenderPartition[] {
  const tileSize = calculateOptimalTileSize(width, height, options);
  const columns = Math.ceil(width / tileSize);
  const rows = Math.ceil(height / tileSize);

  const centerColumn = (columns - 1) / 2;
  const centerRow = (rows - 1) / 2;

  const tiles: Array<RenderPartition & { ring: number; angle: number }> = [];
  for (let row = 0; row < rows; row++) {
    for (let column = 0; column < columns; column++) {
      const startX = column * tileSize;
      const startY = row * tileSize;
      const dx = column - centerColumn;
      const dy = row - centerRow;
      tiles.push({
        startX,
        startY,
        width: Math.min(tileSize, width - startX),
        height: Math.min(tileSize, height - startY),
        ring: Math.max(Math.abs(dx), Math.abs(dy)),
        angle: Math.atan2(dy, dx),
      });
    }
  }

  // Sort by ring, then clockwise within each ring
  tiles.sort((a, b) => a.ring - b.ring || a.angle - b.angle);

  return tiles.map(({ startX, startY, width: w, height: h }) => ({ startX, startY, width: w, height: h }));
}

function calculateOptimalTileSize(width: number, height: number, options: TileOptions): number {
  const totalPixels = width * height;
  const targetTilePixels = totalPixels / options.preferredNumber;
  const tileSize = Math.floor(Math.sqrt(targetTilePixels));
  return Math.max(options.minSize, Math.min(options.maxSize, tileSize));
}

/** Partitions a grid with the given layout. */
export function createPartitions(
  width: number,
  height: number,
  layout: PartitionLayout,
  count: number
): RenderPartition[] {
  if (layout === "tiles") {
    return createTilePartitions(width, height, { preferredNumber: Math.max(1, count), minSize: 8, maxSize: 1000 });
  }
  return createRowPartitions(width, height, count);
}
