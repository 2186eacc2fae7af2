/**
 * Snake body model
 *
 * Segments are kept head-first. Growth never invents a position: it only
 * skips the next tail removal, so the new segment is wherever the tail was.
 */

import { type Coordinate, type Heading, coordKey, translate } from './grid';

/**
 * Result of a single advance, enough for the renderer to patch the screen
 * without redrawing the whole body
 */
export interface SnakeMove {
  head: Coordinate;
  previousHead: Coordinate;
  /** Tail cell that was given up, or null when the snake grew */
  vacated: Coordinate | null;
}

export class Snake {
  private readonly body: Coordinate[];
  // Segment count per cell; a count above 1 means the body overlaps itself
  private readonly occupancy = new Map<string, number>();
  private growPending = false;
  private currentHeading: Heading;

  /**
   * @param segments - Starting cells, head first
   */
  constructor(segments: readonly Coordinate[], heading: Heading = 'right') {
    if (segments.length === 0) {
      throw new Error('Snake needs at least one segment');
    }
    this.body = [...segments];
    for (const segment of segments) this.occupy(segment);
    this.currentHeading = heading;
  }

  get heading(): Heading {
    return this.currentHeading;
  }

  get length(): number {
    return this.body.length;
  }

  get isGrowing(): boolean {
    return this.growPending;
  }

  /** No reversal guard: turning back into the neck is caught by the self check */
  setHeading(heading: Heading): void {
    this.currentHeading = heading;
  }

  grow(): void {
    this.growPending = true;
  }

  advance(): SnakeMove {
    const previousHead = this.head();
    const head = translate(previousHead, this.currentHeading);
    this.body.unshift(head);
    this.occupy(head);

    let vacated: Coordinate | null = null;
    if (this.growPending) {
      this.growPending = false;
    } else {
      const tail = this.body.pop();
      if (tail) {
        this.release(tail);
        vacated = tail;
      }
    }

    return { head, previousHead, vacated };
  }

  head(): Coordinate {
    return this.body[0];
  }

  segments(): readonly Coordinate[] {
    return this.body;
  }

  segmentsExcludingHead(): readonly Coordinate[] {
    return this.body.slice(1);
  }

  occupies(c: Coordinate): boolean {
    return this.occupancy.has(coordKey(c));
  }

  /**
   * True when the head shares its cell with another segment.
   * Always false for a single-segment snake.
   */
  headOverlapsBody(): boolean {
    if (this.body.length < 2) return false;
    return (this.occupancy.get(coordKey(this.head())) ?? 0) > 1;
  }

  private occupy(c: Coordinate): void {
    const key = coordKey(c);
    this.occupancy.set(key, (this.occupancy.get(key) ?? 0) + 1);
  }

  private release(c: Coordinate): void {
    const key = coordKey(c);
    const count = this.occupancy.get(key) ?? 0;
    if (count <= 1) {
      this.occupancy.delete(key);
    } else {
      this.occupancy.set(key, count - 1);
    }
  }
}
