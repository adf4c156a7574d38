import { partitionBy } from "../aggregate/select";
import { ReportConfigError } from "../pipeline/errors";
import { positionOf, type CategoryOrdering } from "../palette/ordering";
import type { DataRecord, DimensionValue } from "../records/schema";
import { deepFreeze, requireField } from "./bindings";
import { buildBoxChart, type BoxBindings } from "./box";
import { buildBarChart, buildLineChart, type SeriesBindings } from "./series";
import type { FacetBinding, FacetGridSpec, FacetPanel, PanelSpec } from "./types";

type FacetInput = { field: string; ordering: CategoryOrdering; label?: string };

export type PanelBindings =
  | { kind: "line"; bindings: Omit<SeriesBindings, "id"> }
  | { kind: "bar"; bindings: Omit<SeriesBindings, "id"> }
  | { kind: "box"; bindings: Omit<BoxBindings, "id"> };

export type FacetGridBindings = {
  id: string;
  title?: string;
  row?: FacetInput;
  col?: FacetInput;
  /** Wrap a column-only grid after this many panels. */
  wrap?: number;
  panel: PanelBindings;
};

function buildPanel(panel: PanelBindings, id: string, records: readonly DataRecord[], title: string): PanelSpec {
  switch (panel.kind) {
    case "line":
      return buildLineChart(records, { ...panel.bindings, id, title });
    case "bar":
      return buildBarChart(records, { ...panel.bindings, id, title });
    case "box":
      return buildBoxChart(records, { ...panel.bindings, id, title });
  }
}

function splitFacet(records: readonly DataRecord[], facet: FacetInput | undefined) {
  if (!facet) return [{ value: null, records: [...records] }];
  // Validates every value against the ordering before splitting.
  for (const record of records) {
    const value = record[facet.field];
    if (typeof value === "string" || typeof value === "number") positionOf(facet.ordering, value, facet.field);
  }
  return partitionBy(records, facet.field, facet.ordering.values);
}

function facetBinding(facet: FacetInput | undefined): FacetBinding | null {
  return facet ? { field: facet.field, label: facet.label ?? facet.field, ordering: facet.ordering } : null;
}

/**
 * Splits records into one panel per (row, col) facet value combination, in
 * ordering order. With both facets set the grid is complete: a combination
 * without data gets an empty panel so every row has the same columns.
 */
export function buildFacetGrid(records: readonly DataRecord[], bindings: FacetGridBindings): FacetGridSpec {
  if (!bindings.row && !bindings.col) {
    throw new ReportConfigError(`Facet grid "${bindings.id}" needs a row or column facet`);
  }
  if (bindings.wrap !== undefined && (bindings.row || !bindings.col)) {
    throw new ReportConfigError(`Facet grid "${bindings.id}" can only wrap a column-only grid`);
  }
  if (bindings.row) requireField(bindings.id, "row facet", bindings.row.field, records);
  if (bindings.col) requireField(bindings.id, "column facet", bindings.col.field, records);

  const col = bindings.col;
  const colValues: (DimensionValue | null)[] = col ? splitFacet(records, col).map((part) => part.value) : [null];

  const panels: FacetPanel[] = [];
  for (const rowPart of splitFacet(records, bindings.row)) {
    for (const colValue of colValues) {
      const row: DimensionValue | null = rowPart.value;
      const cell = col ? rowPart.records.filter((record) => record[col.field] === colValue) : rowPart.records;
      const title = [row, colValue].filter((v) => v !== null).join(" | ");
      const panelId = `${bindings.id}[${title}]`;
      panels.push({ row, col: colValue, title, chart: buildPanel(bindings.panel, panelId, cell, title) });
    }
  }

  return deepFreeze({
    kind: "facet_grid" as const,
    id: bindings.id,
    title: bindings.title ?? bindings.id,
    row: facetBinding(bindings.row),
    col: facetBinding(bindings.col),
    wrap: bindings.wrap ?? null,
    panelKind: bindings.panel.kind,
    panels,
  });
}
