// src/services/catalog/ActionCatalog.ts
import { IntegrationAction } from '../../models/action.model';
import { CatalogLoadError } from '../errors';

/**
 * Read-only, in-memory snapshot of the known integration actions.
 * Declaration order is preserved and used as the final selection tie-break,
 * so concurrent runs can share one instance without locking.
 */
export class ActionCatalog {
  private readonly actions: readonly IntegrationAction[];
  private readonly byId = new Map<string, IntegrationAction>();
  private readonly order = new Map<string, number>();

  constructor(actions: readonly IntegrationAction[]) {
    const frozen: IntegrationAction[] = [];
    actions.forEach((action, index) => {
      if (this.byId.has(action.id)) {
        throw new CatalogLoadError(`Duplicate action id in catalog: ${action.id}`);
      }
      const copy = freezeAction(action);
      this.byId.set(copy.id, copy);
      this.order.set(copy.id, index);
      frozen.push(copy);
    });
    this.actions = Object.freeze(frozen);
  }

  get size(): number {
    return this.actions.length;
  }

  public getAll(): readonly IntegrationAction[] {
    return this.actions;
  }

  public get(actionId: string): IntegrationAction | undefined {
    return this.byId.get(actionId);
  }

  public has(actionId: string): boolean {
    return this.byId.has(actionId);
  }

  /** Declaration position, or -1 when the id is unknown */
  public indexOf(actionId: string): number {
    return this.order.get(actionId) ?? -1;
  }

  /** Distinct platform names in declaration order */
  public getPlatforms(): string[] {
    const seen = new Set<string>();
    for (const action of this.actions) {
      seen.add(action.platform);
    }
    return Array.from(seen);
  }

  public getByPlatform(platform: string): IntegrationAction[] {
    const wanted = platform.toLowerCase();
    return this.actions.filter((action) => action.platform.toLowerCase() === wanted);
  }
}

function freezeAction(action: IntegrationAction): IntegrationAction {
  const parameterSchema = Object.fromEntries(
    Object.entries(action.parameterSchema).map(([name, spec]) => [
      name,
      Object.freeze({
        ...spec,
        constraints: spec.constraints ? Object.freeze({ ...spec.constraints }) : undefined,
        aliases: spec.aliases ? [...spec.aliases] : undefined,
      }),
    ]),
  );
  return Object.freeze({ ...action, parameterSchema: Object.freeze(parameterSchema) });
}
