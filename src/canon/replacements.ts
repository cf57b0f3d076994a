import {
  COMPONENT_NAMES,
  makeRange,
  parsedLength,
  shiftParsed,
  type CanonUrlResult,
  type Component,
  type ComponentName,
  type Parsed,
  type UrlSource,
} from '../types.js';
import { appendSourceText } from './escape.js';
import type { CanonOutput } from './output.js';
import { schemeEquals } from './scheme.js';
import { sourceLength } from './source.js';

/** Where each component's text lives; lets base and replacement text mix in one pass. */
export type ComponentSources = Record<ComponentName, UrlSource>;

export type ComponentReplacement =
  | { readonly kind: 'keep' }
  | { readonly kind: 'delete' }
  | { readonly kind: 'replace'; readonly value: UrlSource };

/** Missing entries keep the base's component. Replacing with empty text deletes. */
export type Replacements = Partial<Record<ComponentName, ComponentReplacement>>;

export const keepComponent: ComponentReplacement = { kind: 'keep' };
export const deleteComponent: ComponentReplacement = { kind: 'delete' };

export function replaceComponent(value: UrlSource): ComponentReplacement {
  return { kind: 'replace', value };
}

export interface ComponentOverride {
  source: UrlSource;
  component: Component | undefined;
}

export type ComponentOverrides = Partial<Record<ComponentName, ComponentOverride>>;

export function uniformSources(source: UrlSource): ComponentSources {
  return {
    scheme: source,
    username: source,
    password: source,
    host: source,
    port: source,
    path: source,
    query: source,
    ref: source,
  };
}

export function toOverrides(replacements: Replacements): ComponentOverrides {
  const overrides: ComponentOverrides = {};
  for (const name of COMPONENT_NAMES) {
    const replacement = replacements[name];
    if (!replacement || replacement.kind === 'keep') {
      continue;
    }
    if (replacement.kind === 'delete' || sourceLength(replacement.value) === 0) {
      overrides[name] = { source: '', component: undefined };
    } else {
      overrides[name] = {
        source: replacement.value,
        component: makeRange(0, sourceLength(replacement.value)),
      };
    }
  }
  return overrides;
}

/**
 * Builds the per-component sources and ranges for re-canonicalizing `base` with
 * `overrides` applied. Overrides for components outside `allowed` are ignored.
 */
export function setupOverrideComponents(
  base: UrlSource,
  baseParsed: Parsed,
  overrides: ComponentOverrides,
  allowed: readonly ComponentName[],
): { sources: ComponentSources; parsed: Parsed } {
  const sources = uniformSources(base);
  const parsed: Parsed = { ...baseParsed };

  for (const name of allowed) {
    const override = overrides[name];
    if (override) {
      sources[name] = override.source;
      parsed[name] = override.component;
    }
  }

  return { sources, parsed };
}

/** Writes the base back unchanged and reports failure. */
export function copyBase(base: UrlSource, baseParsed: Parsed, output: CanonOutput): CanonUrlResult {
  const offset = output.length;
  appendSourceText(base, 0, parsedLength(baseParsed), output);
  return { success: false, parsed: shiftParsed(baseParsed, offset) };
}

export function overridesSchemeTo(override: ComponentOverride | undefined, scheme: string): boolean {
  return override !== undefined && schemeEquals(override.source, override.component, scheme);
}
