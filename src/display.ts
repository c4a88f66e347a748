// Display (toString) for relative deltas.

import {
  ABSOLUTE_UNITS,
  type DeltaFields,
  RELATIVE_UNITS,
} from "./fields.js";

function signed(n: number): string {
  return n > 0 ? `+${n}` : `${n}`;
}

/**
 * Render a delta as `RelativeDelta(years=+1, months=+2, day=1,
 * weekday=monday(+1))`: nonzero relative fields, then absolute fields, then
 * the weekday.
 */
export function display(fields: DeltaFields): string {
  const parts: string[] = [];
  for (const unit of RELATIVE_UNITS) {
    if (fields[unit] !== 0) parts.push(`${unit}=${signed(fields[unit])}`);
  }
  for (const unit of ABSOLUTE_UNITS) {
    const value = fields[unit];
    if (value !== null) parts.push(`${unit}=${value}`);
  }
  if (fields.weekday !== null) {
    const { weekday, occurrence } = fields.weekday;
    parts.push(`weekday=${weekday}(${signed(occurrence)})`);
  }
  return `RelativeDelta(${parts.join(", ")})`;
}
