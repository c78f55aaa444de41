const CSV_LINE_BREAK = "\r\n";

/** Quote every value; embedded quotes are doubled. */
export function csvQuote(value: string | null | undefined): string {
  return `"${(value ?? "").replace(/"/g, '""')}"`;
}

export function toCsv<K extends string>(
  headers: readonly K[],
  rows: Array<Record<K, string>>
): string {
  const lines = [
    headers.map(csvQuote).join(","),
    ...rows.map((row) => headers.map((h) => csvQuote(row[h])).join(",")),
  ];
  return lines.join(CSV_LINE_BREAK) + CSV_LINE_BREAK;
}
