/**
 * Model Catalog
 *
 * The models cmdfor accepts and what each one costs, defined as data.
 * A model missing from the catalog is rejected before any request is made.
 * Prices are USD per million tokens.
 */

export interface ModelPricing {
  input: number;
  cachedInput: number;
  output: number;
}

export interface ModelDef {
  /** Model identifier sent to the backend */
  id: string;
  pricing: ModelPricing;
}

export type ModelCatalog = readonly ModelDef[];

export const DEFAULT_MODEL = "gpt-4o";

export const DEFAULT_CATALOG: ModelCatalog = [
  { id: "gpt-4o", pricing: { input: 2.5, cachedInput: 1.25, output: 10 } },
  { id: "gpt-4o-mini", pricing: { input: 0.15, cachedInput: 0.075, output: 0.6 } },
  { id: "gpt-4.1", pricing: { input: 2, cachedInput: 0.5, output: 8 } },
  { id: "gpt-4.1-mini", pricing: { input: 0.4, cachedInput: 0.1, output: 1.6 } },
  { id: "gpt-4.1-nano", pricing: { input: 0.1, cachedInput: 0.025, output: 0.4 } },
];

/** Get a model by id, or undefined if it is not supported */
export function findModel(catalog: ModelCatalog, id: string): ModelDef | undefined {
  return catalog.find((model) => model.id === id);
}

export function supportedModelIds(catalog: ModelCatalog): string[] {
  return catalog.map((model) => model.id);
}
