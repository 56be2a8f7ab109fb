import type {
  ImplementationName,
  KeyLayout,
  ReportLayout,
  ResultTree,
  SectionLayout,
  SectionResults
} from "lib/report/types.js";

export interface SelectedSection {
  layout: SectionLayout;
  results: SectionResults;
  /** Declared keys holding at least one record, in declared order. */
  keys: KeyLayout[];
  /** Implementations with a record under any of `keys`, in report order. */
  implementations: ImplementationName[];
}

export interface UndeclaredEntry {
  section: string;
  key?: string;
}

function hasRecords(results: SectionResults, key: string): boolean {
  const records = Object.prototype.hasOwnProperty.call(results, key) ? results[key] : undefined;
  return records !== undefined && Object.keys(records).length > 0;
}

export function presentKeys(section: SectionLayout, results: SectionResults): KeyLayout[] {
  return section.keys.filter((entry) => hasRecords(results, entry.key));
}

export function orderImplementations(
  names: Iterable<ImplementationName>,
  declared: readonly ImplementationName[]
): ImplementationName[] {
  const present = new Set(names);
  const ordered = declared.filter((name) => present.has(name));
  const declaredSet = new Set(declared);
  const extra = [...present]
    .filter((name) => !declaredSet.has(name))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return [...ordered, ...extra];
}

export function selectSections(tree: ResultTree, layout: ReportLayout): SelectedSection[] {
  const selected: SelectedSection[] = [];
  for (const section of layout.sections) {
    const results = Object.prototype.hasOwnProperty.call(tree, section.key) ? tree[section.key] : undefined;
    if (!results) {
      continue;
    }
    const keys = presentKeys(section, results);
    if (keys.length === 0) {
      continue;
    }
    const names = new Set<ImplementationName>();
    for (const entry of keys) {
      Object.keys(results[entry.key] ?? {}).forEach((name) => names.add(name));
    }
    selected.push({
      layout: section,
      results,
      keys,
      implementations: orderImplementations(names, layout.implementations)
    });
  }
  return selected;
}

/**
 * Input entries the layout does not declare. They are never rendered; the
 * composer only reports them.
 */
export function collectUndeclared(tree: ResultTree, layout: ReportLayout): UndeclaredEntry[] {
  const undeclared: UndeclaredEntry[] = [];
  const sections = new Map(layout.sections.map((section) => [section.key, section]));
  for (const sectionKey of Object.keys(tree).sort()) {
    const section = sections.get(sectionKey);
    if (!section) {
      undeclared.push({ section: sectionKey });
      continue;
    }
    const declaredKeys = new Set(section.keys.map((entry) => entry.key));
    for (const key of Object.keys(tree[sectionKey] ?? {}).sort()) {
      if (!declaredKeys.has(key)) {
        undeclared.push({ section: sectionKey, key });
      }
    }
  }
  return undeclared;
}
