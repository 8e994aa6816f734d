/**
 * Memory Tracer
 *
 * A tracer that keeps breakpoints in memory without running anything. Used for
 * post-mortem sessions over snapshots and as the default collaborator.
 */

import type { BreakpointRequest, Tracer, TracerBreakpoint } from './frame.js';

export class MemoryTracer implements Tracer {
  private breakpoints: Map<string, TracerBreakpoint[]> = new Map();
  private nextId: number = 1;

  setBreakpoint(request: BreakpointRequest): TracerBreakpoint {
    const bp: TracerBreakpoint = {
      ...request,
      temporary: request.temporary ?? false,
      id: this.nextId++,
      enabled: true,
      hits: 0,
    };
    const existing = this.breakpoints.get(bp.file) ?? [];
    existing.push(bp);
    this.breakpoints.set(bp.file, existing);
    return bp;
  }

  clearBreakpoint(id: number): boolean {
    for (const [file, specs] of this.breakpoints) {
      const index = specs.findIndex((bp) => bp.id === id);
      if (index !== -1) {
        specs.splice(index, 1);
        if (specs.length === 0) {
          this.breakpoints.delete(file);
        }
        return true;
      }
    }
    return false;
  }

  setCondition(id: number, condition: string | undefined): TracerBreakpoint {
    const bp = this.find(id);
    if (!bp) {
      throw new Error(`No breakpoint number ${id}`);
    }
    bp.condition = condition;
    return bp;
  }

  listBreakpoints(): TracerBreakpoint[] {
    const all: TracerBreakpoint[] = [];
    for (const specs of this.breakpoints.values()) {
      all.push(...specs);
    }
    return all.sort((a, b) => a.id - b.id);
  }

  private find(id: number): TracerBreakpoint | undefined {
    return this.listBreakpoints().find((bp) => bp.id === id);
  }
}
