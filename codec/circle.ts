import { Oid } from "../query/oid.ts";
import { Circle } from "../types/circle.ts";
import type { FixedWidthCodec } from "./codec.ts";

/**
 * `circle` is three float8: center x, center y and radius
 *
 * https://github.com/postgres/postgres/blob/master/src/backend/utils/adt/geo_ops.c
 */
export const circleCodec: FixedWidthCodec<Circle> = {
  name: "circle",
  oid: Oid.circle,
  width: 24,
  is(value): value is Circle {
    return value instanceof Circle;
  },
  read(reader) {
    // field order matters: x, y, then radius
    const x = reader.readDouble();
    const y = reader.readDouble();
    const radius = reader.readDouble();
    return new Circle(x, y, radius);
  },
  readText(reader, length) {
    return this.read(reader, length).toString();
  },
  validateAndGetLength() {
    return 24;
  },
  write(value, writer) {
    const circle = typeof value === "string" ? Circle.parse(value) : value;
    writer.addDouble(circle.x);
    writer.addDouble(circle.y);
    writer.addDouble(circle.radius);
  },
};
