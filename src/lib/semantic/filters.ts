// dbt metric filter templates: {{ Dimension('entity__dim') }} and
// {{ TimeDimension('entity__dim', 'grain') }}

export interface FilterReference {
  /** The template as written, braces included */
  text: string;
  entity: string;
  dimension: string;
  granularity?: string;
}

const REFERENCE_RE =
  /\{\{\s*(?:Dimension\(\s*['"](\w+)__(\w+)['"]\s*\)|TimeDimension\(\s*['"](\w+)__(\w+)['"]\s*,\s*['"](\w+)['"]\s*\))\s*\}\}/g;

const TEMPLATE_RE = /\{\{.*?\}\}/g;

function toReference(
  text: string,
  groups: ReadonlyArray<string | undefined>
): FilterReference | undefined {
  const [dimEntity, dimName, timeEntity, timeName, granularity] = groups;
  if (dimEntity !== undefined && dimName !== undefined) {
    return { text, entity: dimEntity, dimension: dimName };
  }
  if (timeEntity !== undefined && timeName !== undefined) {
    return { text, entity: timeEntity, dimension: timeName, granularity };
  }
  return undefined;
}

export function filterKey(ref: FilterReference): string {
  return `${ref.entity}__${ref.dimension}`;
}

/** Dimension references in order of appearance */
export function filterReferences(expr: string): FilterReference[] {
  const refs: FilterReference[] = [];
  for (const match of expr.matchAll(REFERENCE_RE)) {
    const ref = toReference(match[0], match.slice(1));
    if (ref) refs.push(ref);
  }
  return refs;
}

/** Templates other than Dimension/TimeDimension, e.g. {{ Entity('user') }} */
export function unsupportedTemplates(expr: string): string[] {
  return [...expr.replace(REFERENCE_RE, "").matchAll(TEMPLATE_RE)].map((m) => m[0]);
}

/** Replace every dimension reference with the SQL `resolve` returns for it */
export function substituteReferences(
  expr: string,
  resolve: (ref: FilterReference) => string
): string {
  return expr.replace(REFERENCE_RE, (text: string, ...groups: Array<string | undefined>) => {
    const ref = toReference(text, groups.slice(0, 5));
    return ref ? resolve(ref) : text;
  });
}
