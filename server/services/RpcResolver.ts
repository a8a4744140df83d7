import type { IntegrationDefinition, RpcDefinition } from '../connectors/types.js';
import { ConfigurationError, RpcError } from '../core/errors.js';
import { toText } from '../core/ExpressionValue.js';
import type { ModuleExecutor } from '../integrations/ModuleExecutor.js';
import { resolveParameters } from '../runtime/parameters.js';
import type { Scope } from '../runtime/Scope.js';
import { getErrorMessage, type RuntimeLogger } from '../types/common.js';
import { isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';

export interface RpcOption {
  label: string;
  value: JsonValue;
  default?: boolean;
  /** Grouped options. */
  options?: RpcOption[];
  /** Child RPC to load once this option is picked. */
  nested?: JsonValue;
}

export type RpcResolution =
  | { ok: true; options: RpcOption[] }
  | { ok: false; error: RpcError; options: [] };

function isAbsent(value: JsonValue | undefined): boolean {
  return value === undefined || value === null || value === '';
}

/** Accepts `{label, value}` maps as well as bare scalars, which become their own label. */
export function normalizeOption(raw: JsonValue): RpcOption | null {
  if (raw === null) {
    return null;
  }
  if (!isJsonObject(raw)) {
    if (Array.isArray(raw)) {
      return null;
    }
    return { label: toText(raw), value: raw };
  }
  const value = raw.value ?? null;
  const label = raw.label === undefined || raw.label === null ? toText(value) : toText(raw.label);
  const option: RpcOption = { label, value };
  if (raw.default === true) {
    option.default = true;
  }
  if (Array.isArray(raw.options)) {
    option.options = raw.options.map(normalizeOption).filter((entry): entry is RpcOption => entry !== null);
  }
  if (raw.nested !== undefined && raw.nested !== null) {
    option.nested = raw.nested;
  }
  return option;
}

/**
 * Loads dynamic choices for parameters. Failures never propagate: they are logged
 * and reported as `{ ok: false }` so a form can still render.
 */
export class RpcResolver {
  private readonly logger: RuntimeLogger;

  constructor(
    private readonly definition: IntegrationDefinition,
    private readonly modules: ModuleExecutor,
    logger?: RuntimeLogger,
  ) {
    this.logger = logger ?? console;
  }

  getDefinition(rpcId: string): RpcDefinition {
    const rpc = this.definition.rpcs?.[rpcId];
    if (!rpc) {
      throw new ConfigurationError(`Unknown RPC "${rpcId}" in integration "${this.definition.name}"`);
    }
    return rpc;
  }

  /**
   * `scope` is built lazily so that a nested RPC missing its parent value fails
   * before any connection refresh or request is made.
   */
  async resolve(rpcId: string, parameters: JsonObject, scope: () => Promise<Scope>): Promise<RpcResolution> {
    let rpc: RpcDefinition;
    try {
      rpc = this.getDefinition(rpcId);
    } catch (error) {
      return this.fail(rpcId, getErrorMessage(error), error);
    }

    if (rpc.nested && isAbsent(parameters[rpc.nested.parameter])) {
      return {
        ok: false,
        error: new RpcError(rpcId, `Select "${rpc.nested.parameter}" before loading ${rpcId}`),
        options: [],
      };
    }

    try {
      const resolved = resolveParameters(rpc.parameters, parameters, `rpcs.${rpcId}`);
      const base = await scope();
      const result = await this.modules.run(rpc.communication, base.with({ parameters: resolved }));
      const options = result.outputs
        .flatMap(output => (Array.isArray(output) ? output : [output]))
        .map(normalizeOption)
        .filter((option): option is RpcOption => option !== null);
      return { ok: true, options };
    } catch (error) {
      return this.fail(rpcId, getErrorMessage(error), error);
    }
  }

  private fail(rpcId: string, message: string, cause: unknown): RpcResolution {
    this.logger.warn(`[RpcResolver] ${rpcId} failed: ${message}`);
    return { ok: false, error: new RpcError(rpcId, message, { cause }), options: [] };
  }
}
