import { StatsSummary } from './forecast-cache.interface';

export class StatsCollector {
  private hits = 0;
  private misses = 0;

  recordHit(): void {
    this.hits++;
  }

  recordMiss(): void {
    this.misses++;
  }

  summary(): StatsSummary {
    return {
      hits: this.hits,
      misses: this.misses,
      totalCalls: this.hits + this.misses,
    };
  }
}
