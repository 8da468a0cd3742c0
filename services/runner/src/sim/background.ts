export interface BackgroundTile {
  /** Absolute tile index along the scroll; odd tiles use the mirrored image. */
  index: number;
  x: number;
  mirrored: boolean;
}

export function advanceScroll(offset: number, speed: number): number {
  return offset + speed;
}

export function backgroundTiles(offset: number, viewportWidth: number, tileWidth: number): BackgroundTile[] {
  if (tileWidth <= 0) {
    return [];
  }

  const count = Math.ceil(viewportWidth / tileWidth) + 2;
  const firstTile = Math.floor(offset / tileWidth);
  const shift = ((offset % tileWidth) + tileWidth) % tileWidth;

  const tiles: BackgroundTile[] = [];
  for (let i = 0; i < count; i += 1) {
    const index = firstTile + i;
    tiles.push({
      index,
      x: i * tileWidth - shift,
      mirrored: Math.abs(index % 2) === 1,
    });
  }
  return tiles;
}
