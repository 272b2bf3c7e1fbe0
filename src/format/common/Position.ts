import { type SexprCursor, type SexprEntity, keywordPresence } from "../../convert/traits";
import { type Sexpr, listWithName, number } from "../../sexpr/Sexpr";

/** `(at X Y [ANGLE])`. The angle is kept only when the source wrote one. */
export interface Position {
  x: number;
  y: number;
  angle?: number;
}

function parsePosition<P extends SexprCursor<P>>(parser: P): Position {
  parser.expectSymbolMatching("at");
  const x = parser.expectNumber();
  const y = parser.expectNumber();
  const angle = parser.maybeNumber();
  parser.expectEnd();
  return angle !== undefined ? { x, y, angle } : { x, y };
}

function positionToSexpr(position: Position): Sexpr {
  return listWithName("at", [
    number(position.x),
    number(position.y),
    position.angle !== undefined ? number(position.angle) : undefined,
  ]);
}

export const PositionFormat: SexprEntity<Position> = {
  ...keywordPresence("at"),
  fromSexpr: parsePosition,
  fromSexprRef: parsePosition,
  toSexpr: positionToSexpr,
};
