import { TemporalError } from "../error.ts";

/**
 * https://www.postgresql.org/docs/current/datatype-geometric.html#DATATYPE-GEOMETRIC-POINTS
 */
export interface Point {
  x: number;
  y: number;
}

const CIRCLE_RE = /^\s*[<(]?\s*\(([^)]*)\)\s*,([^)>]*)[)>]?\s*$/;

// float8 input spellings of the special values, matched case-insensitively
const SPECIAL_FLOATS = new Map<string, number>([
  ["nan", NaN],
  ["infinity", Infinity],
  ["+infinity", Infinity],
  ["-infinity", -Infinity],
  ["inf", Infinity],
  ["+inf", Infinity],
  ["-inf", -Infinity],
]);

function parseCoordinate(circle: string, value: string, name: string): number {
  const trimmed = value.trim();
  const special = SPECIAL_FLOATS.get(trimmed.toLowerCase());
  if (special !== undefined) {
    return special;
  }

  const number = Number(trimmed);
  if (trimmed === "" || Number.isNaN(number)) {
    throw new TemporalError(
      "FormatError",
      `Invalid Circle: "${circle}". Circle ${name} "${trimmed}" must be a valid number.`,
    );
  }
  return number;
}

/**
 * https://www.postgresql.org/docs/current/datatype-geometric.html#DATATYPE-CIRCLE
 */
export class Circle {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly radius: number,
  ) {}

  /**
   * Accepts `<(x,y),r>`, `((x,y),r)` and `(x,y),r`, with `NaN` and
   * `Infinity` allowed for any number
   *
   * Throws a TemporalError of kind `FormatError` for anything else
   */
  static parse(value: string): Circle {
    const matches = CIRCLE_RE.exec(value);
    if (!matches) {
      throw new TemporalError(
        "FormatError",
        `Invalid Circle: "${value}". Circle must be written as <(x,y),r>.`,
      );
    }

    const coordinates = matches[1].split(",");
    if (coordinates.length !== 2) {
      throw new TemporalError(
        "FormatError",
        `Invalid Circle: "${value}". Circle center must have only 2 coordinates, ${coordinates.length} given.`,
      );
    }

    const [x, y] = coordinates;
    return new Circle(
      parseCoordinate(value, x, "center x"),
      parseCoordinate(value, y, "center y"),
      parseCoordinate(value, matches[2], "radius"),
    );
  }

  get center(): Point {
    return { x: this.x, y: this.y };
  }

  equals(other: Circle): boolean {
    return this.x === other.x && this.y === other.y &&
      this.radius === other.radius;
  }

  toString(): string {
    return `<(${this.x},${this.y}),${this.radius}>`;
  }
}
