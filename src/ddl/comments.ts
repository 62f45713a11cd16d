function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

export function commentOnTable(table: string, text: string): string {
  return `COMMENT ON TABLE ${table} IS ${quoteLiteral(text)}`;
}

export function commentOnColumn(table: string, column: string, text: string): string {
  return `COMMENT ON COLUMN ${table}.${column} IS ${quoteLiteral(text)}`;
}
