import type { Entity } from '../entity-store.js';

export type TaskLevel = 'directive' | 'mission' | 'job';

export interface DescribeEntry {
  readonly level: TaskLevel;
  readonly entity: Entity;
  readonly text: string;
}

/**
 * Collects human-readable task status for a presentation layer. Purely
 * observational.
 */
export interface DescribeSink {
  add(level: TaskLevel, entity: Entity, text: string): void;
}

export class DescribeLog implements DescribeSink {
  private entries: DescribeEntry[] = [];

  add(level: TaskLevel, entity: Entity, text: string): void {
    this.entries.push({ level, entity, text });
  }

  list(level?: TaskLevel): readonly DescribeEntry[] {
    return level === undefined
      ? [...this.entries]
      : this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries = [];
  }
}

export const discardDescribeSink: DescribeSink = {
  add() {},
};
