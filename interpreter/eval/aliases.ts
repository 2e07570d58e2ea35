import type { Namespace } from '@interpreter/env/Namespace';
import type { ActionRegistry } from '@core/registry/ActionRegistry';
import type { ActionHandler, AliasOrigin, RequestTable } from '@core/types/namespace';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { isValidIdentifier } from '@core/utils/identifiers';
import { aliasLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export interface AliasResolution {
  readonly value: unknown;
  readonly origin: AliasOrigin;
  /** True when the value was taken from an earlier pass rather than re-resolved */
  readonly restored: boolean;
}

interface PlannedRequest {
  action: string;
  alias: string;
  target: string;
  handler: ActionHandler;
}

/**
 * Checks a request table against the registered actions and returns the
 * requests in table order. Nothing is invoked, so a bad table fails before
 * any action has side effects.
 */
export function planRequests(namespace: string, requests: RequestTable, actions: ActionRegistry): PlannedRequest[] {
  const planned: PlannedRequest[] = [];

  for (const [action, aliases] of Object.entries(requests)) {
    const handler = actions.resolve(action);
    if (!handler) {
      throw ConfigurationError.unknownAction(action, namespace, actions.names());
    }

    for (const [alias, target] of Object.entries(aliases)) {
      if (!isValidIdentifier(alias)) {
        throw new ConfigurationError(`Invalid alias '${alias}' in '${action}' request`, { action, alias, target, namespace });
      }
      if (typeof target !== 'string' || target.length === 0) {
        throw new ConfigurationError(`Alias '${alias}' in '${action}' request has no target`, { action, alias, namespace });
      }
      planned.push({ action, alias, target, handler });
    }
  }

  return planned;
}

/**
 * Resolves the explicit requests, then restores every alias persisted by an
 * earlier pass that the table did not mention, without invoking its action
 * again. An alias named in the table is always re-resolved.
 */
export function resolveAliases(
  namespace: Namespace,
  requests: RequestTable,
  actions: ActionRegistry,
  logger: ILogger = aliasLogger
): Map<string, AliasResolution> {
  const planned = planRequests(namespace.name, requests, actions);
  const resolved = new Map<string, AliasResolution>();

  for (const { action, alias, target, handler } of planned) {
    if (resolved.has(alias)) {
      logger.warn(`Alias '${alias}' is requested more than once; the last request wins`, {
        namespace: namespace.name,
        action
      });
    }

    const value = handler(target, { alias, requester: namespace.name });
    resolved.set(alias, { value, origin: { action, target }, restored: false });
  }

  for (const [name, local] of namespace.persistedLocals) {
    if (local.origin && !resolved.has(name)) {
      resolved.set(name, { value: local.value, origin: local.origin, restored: true });
    }
  }

  logger.debug('Resolved aliases', {
    namespace: namespace.name,
    resolved: planned.length,
    restored: resolved.size - new Set(planned.map(request => request.alias)).size
  });

  return resolved;
}
