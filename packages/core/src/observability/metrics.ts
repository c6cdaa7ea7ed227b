/**
 * Counters for schema growth and lenient-write outcomes
 */

export interface FieldMetrics {
  /** Slots registered for this field name */
  growths: number;
  /** Lenient writes whose value was discarded because the feature lagged the schema */
  droppedWrites: number;
  /** Strict writes that failed with KeyNotFoundError */
  rejectedWrites: number;
}

class MetricsCollector {
  #metrics = new Map<string, FieldMetrics>();

  #getMetrics(field: string): FieldMetrics {
    let metrics = this.#metrics.get(field);
    if (!metrics) {
      metrics = { growths: 0, droppedWrites: 0, rejectedWrites: 0 };
      this.#metrics.set(field, metrics);
    }
    return metrics;
  }

  recordGrowth(field: string): void {
    this.#getMetrics(field).growths++;
  }

  recordDroppedWrite(field: string): void {
    this.#getMetrics(field).droppedWrites++;
  }

  recordRejectedWrite(field: string): void {
    this.#getMetrics(field).rejectedWrites++;
  }

  /**
   * Get metrics for a field
   */
  getMetrics(field: string): FieldMetrics | undefined {
    const metrics = this.#metrics.get(field);
    return metrics ? { ...metrics } : undefined;
  }

  /**
   * Sum over every field
   */
  totals(): FieldMetrics {
    const total: FieldMetrics = { growths: 0, droppedWrites: 0, rejectedWrites: 0 };
    for (const m of this.#metrics.values()) {
      total.growths += m.growths;
      total.droppedWrites += m.droppedWrites;
      total.rejectedWrites += m.rejectedWrites;
    }
    return total;
  }

  /**
   * Reset metrics for one field, or all of them
   */
  reset(field?: string): void {
    if (field) {
      this.#metrics.delete(field);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
