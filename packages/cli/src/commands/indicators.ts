import { LABEL_DESCRIPTIONS, LabelSchema } from "@pagescope/engine";
import { formatIndicatorsTable } from "../formatter.js";

export function runIndicators(): void {
  const rows = LabelSchema.options.map((label) => ({
    label,
    description: LABEL_DESCRIPTIONS[label],
    optIn: label === "reachable-without-auth",
  }));

  process.stdout.write(formatIndicatorsTable(rows));
}
