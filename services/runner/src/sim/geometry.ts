export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Real-valued position with an integer size. */
export interface Body {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function boxOf(body: Body): Rect {
  return { x: Math.trunc(body.x), y: Math.trunc(body.y), w: body.width, h: body.height };
}

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y;
}

export function bodiesOverlap(a: Body, b: Body): boolean {
  return rectsOverlap(boxOf(a), boxOf(b));
}

export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}

export function rightEdge(body: Body): number {
  return Math.trunc(body.x) + body.width;
}

export function bottomEdge(body: Body): number {
  return Math.trunc(body.y) + body.height;
}
