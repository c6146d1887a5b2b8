export type ConversionTraceEvent =
  | {
      type: "wrap";
      wrapper: number;
      ops: number[];
      captures: number;
      escapes: number;
    }
  | {
      type: "pattern_applied";
      pattern: string;
      op: number;
      name: string;
      created: number[];
    }
  | {
      type: "pattern_rejected";
      pattern: string;
      op: number;
      name: string;
      reason: "no_match" | "no_progress" | "unsupported_type" | "structural_violation";
      message?: string;
    }
  | {
      type: "op_blocked";
      op: number;
      name: string;
      generation: number;
    }
  | {
      type: "stuck";
      reason: "no_applicable_pattern" | "rewrite_limit";
      ops: number[];
    }
  | {
      type: "restored";
      generation: number;
    };

export class ConversionTrace {
  private readonly events: ConversionTraceEvent[] = [];

  record(event: ConversionTraceEvent): void {
    this.events.push(event);
  }

  snapshot(): ConversionTraceEvent[] {
    return this.events.slice();
  }
}
