import Table from 'cli-table3';

/**
 * Prints rows as a table. Column headers default to the keys of the first row.
 */
export function printTable(
  data: Record<string, unknown>[],
  options?: Table.TableConstructorOptions,
) {
  const head = options?.head ?? (data.length > 0 ? Object.keys(data[0]) : []);
  const table = new Table({ ...options, head });
  data.forEach((row) => table.push(Object.values(row).map((v) => String(v))));
  console.log(table.toString());
}
