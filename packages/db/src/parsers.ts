import { DateTime } from "luxon";
import pg from "pg";

export function initParsers() {
  pg.types.setTypeParser(pg.types.builtins.TIMESTAMPTZ, str => DateTime.fromSQL(str, { setZone: true }).toJSDate());
}
