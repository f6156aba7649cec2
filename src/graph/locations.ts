/**
 * Project-wide index of where each macro is defined.
 */

import type { MacroDefinition } from '../core/types.js';
import type { LatexDocument } from '../storage/document.js';

/**
 * A macro definition paired with the document that contains it.
 */
export interface MacroLocation {
  readonly definition: MacroDefinition;
  readonly document: LatexDocument;
}

/**
 * Index every definition by macro name. Documents are visited in order, so
 * a later document's definition replaces an earlier one of the same name.
 */
export function buildMacroLocations(documents: Iterable<LatexDocument>): ReadonlyMap<string, MacroLocation> {
  const locations = new Map<string, MacroLocation>();
  for (const document of documents) {
    for (const definition of document.definitions.values()) {
      locations.set(definition.name, { definition, document });
    }
  }
  return locations;
}

/**
 * Locations ordered by macro name.
 */
export function sortMacroLocations(locations: ReadonlyMap<string, MacroLocation>): MacroLocation[] {
  return [...locations.values()].sort((a, b) =>
    a.definition.name < b.definition.name ? -1 : a.definition.name > b.definition.name ? 1 : 0
  );
}
