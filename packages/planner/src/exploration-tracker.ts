/**
 * ExplorationTracker: the agent's own map of the game world.
 *
 * Nodes are location hints; edges are "<action> -> <destination>" descriptors
 * recorded under the location a movement action started from. The graph only
 * grows. Each location also carries the list of compass/vertical directions
 * not yet tried from it, seeded once on the location's first observation.
 */

import type { MapState, UntriedDirections } from "@grue/schemas";
import {
  CARDINAL_DIRECTIONS,
  canonicalDirection,
  extractLocation,
  isMovementAction,
} from "./observation.js";

export class ExplorationTracker implements UntriedDirections {
  private edges = new Map<string, Set<string>>();
  private untried = new Map<string, string[]>();

  /**
   * Register the location named by `observationText` and, when a movement
   * action changed the location, the edge that led there.
   */
  observe(previousLocation: string, action: string, observationText: string): string {
    const current = extractLocation(observationText);
    this.visit(current);
    if (isMovementAction(action) && current !== previousLocation) {
      this.visit(previousLocation);
      this.edges.get(previousLocation)?.add(`${action.trim().toLowerCase()} -> ${current}`);
    }
    return current;
  }

  /** Add a location on first sight. Returns true when it was new. */
  visit(location: string): boolean {
    if (this.edges.has(location)) return false;
    this.edges.set(location, new Set());
    this.untried.set(location, [...CARDINAL_DIRECTIONS]);
    return true;
  }

  has(location: string): boolean {
    return this.edges.has(location);
  }

  locationCount(): number {
    return this.edges.size;
  }

  edgesFrom(location: string): string[] {
    return [...(this.edges.get(location) ?? [])].sort();
  }

  // ─── Untried directions ────────────────────────────────────────────────

  untriedDirections(location: string): string[] {
    return [...(this.untried.get(location) ?? [])];
  }

  nextUntriedDirection(location: string, exclude?: ReadonlySet<string>): string | undefined {
    return this.untried.get(location)?.find(dir => !exclude?.has(dir));
  }

  /** Accepts a direction or any of its abbreviations. */
  markDirectionTried(location: string, direction: string): boolean {
    const canonical = canonicalDirection(direction);
    const list = this.untried.get(location);
    if (!canonical || !list) return false;
    const idx = list.indexOf(canonical);
    if (idx === -1) return false;
    list.splice(idx, 1);
    return true;
  }

  // ─── Rendering ─────────────────────────────────────────────────────────

  render(currentLocation: string): string {
    if (this.edges.size === 0) {
      return "Map: No locations explored yet. Try moving around!";
    }
    const lines = ["Explored Locations and Exits:"];
    for (const location of [...this.edges.keys()].sort()) {
      lines.push(`\n* ${location}`);
      for (const edge of this.edgesFrom(location)) {
        lines.push(`    -> ${edge}`);
      }
    }
    lines.push(`\n[Current] ${currentLocation}`);
    return lines.join("\n");
  }

  toMapState(): MapState {
    const state: MapState = {};
    for (const location of [...this.edges.keys()].sort()) {
      state[location] = this.edgesFrom(location);
    }
    return state;
  }
}
