// Catalog of every user-selectable pipeline, validated once at startup

import type { DspEngine } from '../engine/types';
import { InvariantViolation, SchemaError } from '../errors';
import { debug } from '../log';
import { describeProblems, synthesize } from './synthesizer';
import { CorrectionMode, HardwareParams, InputSource, PipelineDescription, Topology } from './types';

const log = debug('catalog');

/**
 * A topology menu entry, e.g. '2.1 DRC' -> 2.1 with room correction
 */
export interface TopologyOption {
  label: string;
  topology: Topology;
  correction: CorrectionMode;
}

/**
 * A source menu entry, e.g. 'Phono' -> direct capture
 */
export interface SourceOption {
  label: string;
  source: InputSource;
}

export interface MenuDefinition {
  topologies: readonly TopologyOption[];
  sources: readonly SourceOption[];
}

export interface CatalogEntry {
  topologyLabel: string;
  sourceLabel: string;
  description: PipelineDescription;
}

/**
 * Immutable map from (topology label, source label) to a validated description
 */
export class Catalog {
  private readonly entries: ReadonlyMap<string, CatalogEntry>;

  constructor(readonly menu: MenuDefinition, entries: CatalogEntry[]) {
    const map = new Map<string, CatalogEntry>();
    for (const entry of entries) {
      map.set(Catalog.key(entry.topologyLabel, entry.sourceLabel), Object.freeze(entry));
    }
    this.entries = map;
    Object.freeze(this);
  }

  private static key(topologyLabel: string, sourceLabel: string): string {
    return JSON.stringify([topologyLabel, sourceLabel]);
  }

  get size(): number {
    return this.entries.size;
  }

  has(topologyLabel: string, sourceLabel: string): boolean {
    return this.entries.has(Catalog.key(topologyLabel, sourceLabel));
  }

  /**
   * Look up a validated description. A miss means the menu and the catalog
   * disagree, which is a construction bug.
   */
  lookup(topologyLabel: string, sourceLabel: string): PipelineDescription {
    const entry = this.entries.get(Catalog.key(topologyLabel, sourceLabel));
    if (!entry) {
      throw new InvariantViolation(`No catalog entry for (${topologyLabel}, ${sourceLabel})`);
    }
    return structuredClone(entry.description);
  }

  list(): CatalogEntry[] {
    return Array.from(this.entries.values());
  }
}

/**
 * Parse a topology label such as '2.1 DRC' or 'Mono' into a menu option
 */
export function parseTopologyLabel(label: string): TopologyOption {
  const [routing, correction, ...rest] = label.trim().split(/\s+/);
  const topology = (['Mono', '2.0', '2.1', '2.2'] as const).find(t => t === routing);
  if (!topology || rest.length > 0 || (correction !== undefined && correction !== 'DRC')) {
    throw new InvariantViolation(`Unrecognized topology label: "${label}"`);
  }
  return { label, topology, correction: correction === 'DRC' ? 'drc' : 'none' };
}

function assertUniqueLabels(kind: string, labels: string[]): void {
  if (labels.length === 0) {
    throw new InvariantViolation(`The ${kind} menu is empty`);
  }
  const seen = new Set<string>();
  for (const label of labels) {
    if (seen.has(label)) {
      throw new InvariantViolation(`Duplicate ${kind} label: "${label}"`);
    }
    seen.add(label);
  }
}

/**
 * Synthesize and validate every topology x source combination.
 * Rejects on the first failure; there is no partial catalog.
 */
export async function buildCatalog(
  menu: MenuDefinition,
  hardware: HardwareParams,
  engine: Pick<DspEngine, 'validate'>
): Promise<Catalog> {
  assertUniqueLabels('topology', menu.topologies.map(t => t.label));
  assertUniqueLabels('source', menu.sources.map(s => s.label));

  const entries: CatalogEntry[] = [];
  for (const topology of menu.topologies) {
    for (const source of menu.sources) {
      const description = synthesize(
        {
          topology: topology.topology,
          correction: topology.correction,
          source: source.source,
          sourceLabel: source.label,
        },
        hardware
      );

      const problems = describeProblems(description);
      if (problems.length > 0) {
        throw new SchemaError(
          `Pipeline (${topology.label}, ${source.label}) is inconsistent: ${problems.join('; ')}`,
          problems
        );
      }

      const validated = await engine.validate(description);
      entries.push({ topologyLabel: topology.label, sourceLabel: source.label, description: validated });
      log('validated', topology.label, source.label);
    }
  }

  log(`catalog ready with ${entries.length} pipelines`);
  return new Catalog(menu, entries);
}
