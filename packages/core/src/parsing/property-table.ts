/** Lookup side of {@link PropertyTable}, handed to structural parsers. */
export interface ReadonlyPropertyTable {
  get(name: string): string | undefined;
  has(name: string): boolean;
}

/**
 * Flat store of the latest content seen for each canonical property name.
 * Later declarations of the same property overwrite earlier ones.
 */
export class PropertyTable implements ReadonlyPropertyTable {
  private readonly values = new Map<string, string>();

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, content: string): void {
    this.values.set(name, content);
  }

  get size(): number {
    return this.values.size;
  }
}
