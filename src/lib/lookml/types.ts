// LookML document nodes and small builders for them

export type LookmlNode =
  | { kind: "value"; key: string; value: string } // type: string
  | { kind: "string"; key: string; value: string } // label: "Revenue"
  | { kind: "sql"; key: string; value: string } // sql: ${TABLE}.id ;;
  | { kind: "list"; key: string; values: string[] } // timeframes: [date, week]
  | { kind: "block"; key: string; name?: string; body: LookmlNode[] };

export type LookmlBlock = Extract<LookmlNode, { kind: "block" }>;

export const value = (key: string, v: string): LookmlNode => ({ kind: "value", key, value: v });

export const str = (key: string, v: string): LookmlNode => ({ kind: "string", key, value: v });

export const sql = (key: string, v: string): LookmlNode => ({ kind: "sql", key, value: v });

export const list = (key: string, values: string[]): LookmlNode => ({ kind: "list", key, values });

export const block = (key: string, name: string | undefined, body: LookmlNode[]): LookmlBlock => ({
  kind: "block",
  key,
  name,
  body,
});

// Optional quoted properties, skipped when the value is absent or empty
export function optionalStrings(props: Record<string, string | undefined>): LookmlNode[] {
  const nodes: LookmlNode[] = [];
  for (const [key, v] of Object.entries(props)) {
    if (v) nodes.push(str(key, v));
  }
  return nodes;
}

export function ref(field: string): string {
  return "${" + field + "}";
}
