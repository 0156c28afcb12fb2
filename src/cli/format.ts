import type { ShoppingReport } from "../types/report";
import { compareItemNames } from "../services/report";
import { headerLines } from "./prompts";

export function formatMoney(value: number) {
  return `$${value.toFixed(2)}`;
}

/** Renders the results screen: merged list, price comparison, cheapest option. */
export function formatReport(report: ShoppingReport): string[] {
  const lines = headerLines("CONSOLIDATED SHOPPING LIST");

  if (report.merged.length === 0) {
    lines.push("", "No supplies added yet.");
    return lines;
  }

  lines.push("", "Merged Shopping List from All Offices:");
  for (const { item, quantity } of report.merged) {
    lines.push(`  • ${item}: ${quantity}`);
  }

  if (report.comparison.length === 0) {
    lines.push("", "No stores added yet. Add stores to see price comparison.");
    return lines;
  }

  lines.push(...headerLines("PRICE COMPARISON"));
  const byName = [...report.comparison].sort((a, b) => compareItemNames(a.name, b.name));
  for (const entry of byName) {
    lines.push("", `${entry.name}:`);
    if (entry.total === null) {
      lines.push(`  Status: ⚠ Missing items - ${entry.unavailableItems.join(", ")}`);
    } else {
      lines.push(`  Total Cost: ${formatMoney(entry.total)}`);
    }
  }

  lines.push(...headerLines("CHEAPEST OPTION"));
  const { cheapest, savings } = report;
  if (cheapest.store === null || cheapest.total === null) {
    lines.push("", "⚠ No store has all required items in stock.");
    return lines;
  }

  lines.push(
    "",
    `🏆 Best Choice: ${cheapest.store}`,
    `Total Cost: ${formatMoney(cheapest.total)}`,
    "",
    "Itemized Breakdown:"
  );
  for (const line of cheapest.breakdown) {
    lines.push(
      `  • ${line.item}: ${line.quantity} × ${formatMoney(line.unitPrice)} = ${formatMoney(line.subtotal)}`
    );
  }

  if (savings) {
    lines.push(
      "",
      `💰 You save ${formatMoney(savings.amount)} (${savings.percent.toFixed(1)}%) vs. most expensive option!`
    );
  }

  return lines;
}
