/**
 * Downward propagation of requirement annotations.
 *
 * Linked requirements: REQ-CORE-004
 */

import type { Annotation } from '../core/types.js';
import type { RequirementGraph } from './closure.js';

export interface EffectiveAnnotations {
  /** Deprecated itself or below a deprecated ancestor. */
  deprecated: ReadonlySet<string>;
  /** Manual itself or below a manual ancestor. */
  manual: ReadonlySet<string>;
}

/**
 * Compute effective annotation sets: seed ∪ descendants of every seed.
 * Annotations on ids outside the graph are ignored.
 */
export function propagateAnnotations(
  graph: RequirementGraph,
  annotations: ReadonlyMap<string, Annotation | null>
): EffectiveAnnotations {
  const deprecated = new Set<number>();
  const manual = new Set<number>();

  for (const [id, annotation] of annotations) {
    const index = graph.indexOf.get(id);
    if (index === undefined || annotation === null) continue;

    const target = seedSetFor(annotation, deprecated, manual);
    if (target.has(index)) continue;
    target.add(index);
    for (const d of graph.descendants[index]) target.add(d);
  }

  return {
    deprecated: new Set(Array.from(deprecated, (i) => graph.ids[i])),
    manual: new Set(Array.from(manual, (i) => graph.ids[i])),
  };
}

function seedSetFor(
  annotation: Annotation,
  deprecated: Set<number>,
  manual: Set<number>
): Set<number> {
  switch (annotation) {
    case 'deprecated':
      return deprecated;
    case 'manual':
      return manual;
  }
}
