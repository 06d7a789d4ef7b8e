/**
 * Remote tool proxy
 *
 * A RemoteTool is bound to one tool descriptor, the transport that serves it,
 * the auth token getters and bound parameters it was given, and the client
 * headers. It checks every call locally (auth, arity, types) before touching
 * the network. Proxies are immutable: bindParams / addAuthTokenGetters hand
 * back a new proxy and leave the original as it was.
 */

import type { z } from 'zod';

import { buildArgumentSchema, describeTool, validateArguments } from './schema.js';
import { AuthRequiredError, ValidationError } from './errors.js';
import {
  authTokenHeader,
  duplicateKeys,
  identifyRequiredAuthnParams,
  identifyRequiredAuthzTokens,
  resolveValue,
  toValueSource
} from './utils.js';
import type { ValueSource } from './utils.js';
import type { BaseTransport } from './transports/index.js';
import type { Logger } from './logger.js';
import type { Headers, ParameterDescriptor, ToolDescriptor } from './types.js';

/**
 * Everything a proxy is made of
 */
export interface ToolProxyState {
  name: string;
  descriptor: ToolDescriptor;
  authTokenGetters: Readonly<Record<string, ValueSource>>;
  boundParams: Readonly<Record<string, ValueSource>>;
  clientHeaders: Readonly<Record<string, ValueSource>>;
  /** Used to warn when tokens would travel over plain HTTP */
  baseUrl: string;
  logger: Logger;
}

/**
 * Auth services and parameter names a descriptor can make use of
 */
export function toolRequirements(descriptor: ToolDescriptor): { authServices: Set<string>; paramNames: Set<string> } {
  const authServices = new Set(descriptor.authRequired);
  const paramNames = new Set<string>();
  for (const param of descriptor.parameters) {
    if (param.authSources) {
      param.authSources.forEach((service) => authServices.add(service));
    } else {
      paramNames.add(param.name);
    }
  }
  return { authServices, paramNames };
}

export function normalizeSources(input: Readonly<Record<string, unknown>>): Record<string, ValueSource> {
  const result: Record<string, ValueSource> = {};
  for (const [key, value] of Object.entries(input)) {
    result[key] = toValueSource(value);
  }
  return result;
}

const INSECURE_TOKEN_WARNING =
  'Sending ID token over HTTP. User data may be exposed. Use HTTPS for secure communication.';

/**
 * Validation and copy-with-override logic shared by the async and sync proxies
 */
export abstract class ToolProxyBase<Self> {
  protected readonly state: ToolProxyState;
  private readonly signature: readonly ParameterDescriptor[];
  private readonly argumentSchema: z.ZodObject<z.ZodRawShape>;
  private readonly requiredAuthnParams: Record<string, string[]>;
  private readonly requiredAuthzTokens: string[];

  protected constructor(state: ToolProxyState) {
    this.state = state;
    const { name, descriptor } = state;

    const unknownBindings: string[] = [];
    const authBindings: string[] = [];
    for (const bound of Object.keys(state.boundParams)) {
      const param = descriptor.parameters.find((candidate) => candidate.name === bound);
      if (!param) {
        unknownBindings.push(bound);
      } else if (param.authSources) {
        authBindings.push(bound);
      }
    }
    if (unknownBindings.length > 0) {
      throw new ValidationError(
        `Unable to bind parameter(s) ${unknownBindings.join(', ')}: no such parameter on tool '${name}'`,
        { tool: name, parameters: unknownBindings }
      );
    }
    if (authBindings.length > 0) {
      throw new ValidationError(
        `Unable to bind parameter(s) ${authBindings.join(', ')}: authenticated parameters of tool '${name}' are filled from auth tokens`,
        { tool: name, parameters: authBindings }
      );
    }

    const clashes = Object.keys(state.authTokenGetters)
      .map(authTokenHeader)
      .filter((header) => Object.hasOwn(state.clientHeaders, header));
    if (clashes.length > 0) {
      throw new ValidationError(
        `Client header(s) \`${clashes.join(', ')}\` already registered in client. Cannot register the same header(s) as auth token(s).`,
        { tool: name, headers: clashes }
      );
    }

    const authnParams: Record<string, string[]> = {};
    const plainParams: ParameterDescriptor[] = [];
    for (const param of descriptor.parameters) {
      if (param.authSources) {
        authnParams[param.name] = param.authSources;
      } else {
        plainParams.push(param);
      }
    }

    const services = Object.keys(state.authTokenGetters);
    this.requiredAuthnParams = identifyRequiredAuthnParams(authnParams, services);
    this.requiredAuthzTokens = identifyRequiredAuthzTokens(descriptor.authRequired, services);
    this.signature = plainParams.filter((param) => !Object.hasOwn(state.boundParams, param.name));
    this.argumentSchema = buildArgumentSchema(this.signature);
  }

  /**
   * Build a sibling proxy from new state
   */
  protected abstract derive(state: ToolProxyState): Self;

  get name(): string {
    return this.state.name;
  }

  get description(): string {
    return this.state.descriptor.description;
  }

  /**
   * Parameters a caller still supplies, in declaration order
   */
  get parameters(): readonly ParameterDescriptor[] {
    return this.signature;
  }

  get docstring(): string {
    return describeTool(this.state.descriptor.description, this.signature);
  }

  /**
   * Auth services that must get a token getter before the tool can run
   */
  get pendingAuthServices(): string[] {
    const pending = new Set<string>();
    for (const services of Object.values(this.requiredAuthnParams)) {
      services.forEach((service) => pending.add(service));
    }
    this.requiredAuthzTokens.forEach((service) => pending.add(service));
    return [...pending];
  }

  /**
   * Auth check, arity binding and type validation; no network access
   *
   * Optional parameters left out (or given as null) are not sent.
   */
  protected prepareArguments(positional: readonly unknown[], named: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const pending = this.pendingAuthServices;
    if (pending.length > 0) {
      throw new AuthRequiredError(pending);
    }

    const { name } = this.state;
    if (positional.length > this.signature.length) {
      throw new ValidationError(
        `Tool '${name}' takes ${this.signature.length} positional argument(s) but ${positional.length} were given`,
        { tool: name }
      );
    }

    const args: Record<string, unknown> = {};
    positional.forEach((value, index) => {
      args[this.signature[index].name] = value;
    });

    for (const [key, value] of Object.entries(named)) {
      if (!this.signature.some((param) => param.name === key)) {
        const reason =
          Object.hasOwn(this.state.boundParams, key)
            ? `Parameter '${key}' of tool '${name}' is bound and cannot be passed`
            : `Tool '${name}' got an unexpected keyword argument '${key}'`;
        throw new ValidationError(reason, { tool: name, argument: key });
      }
      if (Object.hasOwn(args, key)) {
        throw new ValidationError(`Tool '${name}' got multiple values for argument '${key}'`, {
          tool: name,
          argument: key
        });
      }
      args[key] = value;
    }

    const missing = this.signature
      .filter((param) => param.required && (!Object.hasOwn(args, param.name) || args[param.name] === undefined))
      .map((param) => `'${param.name}'`);
    if (missing.length > 0) {
      throw new ValidationError(`Tool '${name}' is missing required argument(s): ${missing.join(', ')}`, {
        tool: name
      });
    }

    // absent keys made own so validation never reads inherited members
    for (const param of this.signature) {
      if (!Object.hasOwn(args, param.name)) {
        args[param.name] = undefined;
      }
    }
    validateArguments(name, this.argumentSchema, args);

    for (const key of Object.keys(args)) {
      if (args[key] === undefined || args[key] === null) {
        delete args[key];
      }
    }
    return args;
  }

  protected warnIfInsecure(): void {
    if (Object.keys(this.state.authTokenGetters).length > 0 && this.state.baseUrl.startsWith('http://')) {
      this.state.logger.warn(INSECURE_TOKEN_WARNING);
    }
  }

  /**
   * New proxy with more parameters bound; re-binding a name is an error
   */
  bindParams(params: Readonly<Record<string, unknown>>): Self {
    const duplicates = duplicateKeys(this.state.boundParams, params);
    if (duplicates.length > 0) {
      throw new ValidationError(
        `Cannot re-bind parameter(s) ${duplicates.map((key) => `'${key}'`).join(', ')} of tool '${this.state.name}'`,
        { tool: this.state.name, parameters: duplicates }
      );
    }
    return this.derive({
      ...this.state,
      boundParams: { ...this.state.boundParams, ...normalizeSources(params) }
    });
  }

  bindParam(name: string, value: unknown): Self {
    return this.bindParams({ [name]: value });
  }

  /**
   * New proxy with more auth token getters; re-registering a service is an
   * error, as is a service the tool never uses
   */
  addAuthTokenGetters(getters: Readonly<Record<string, unknown>>): Self {
    const { name } = this.state;
    const duplicates = duplicateKeys(this.state.authTokenGetters, getters);
    if (duplicates.length > 0) {
      throw new ValidationError(
        `Authentication source(s) \`${duplicates.join(', ')}\` already registered in tool \`${name}\`.`,
        { tool: name, services: duplicates }
      );
    }

    const { authServices } = toolRequirements(this.state.descriptor);
    const unused = Object.keys(getters).filter((service) => !authServices.has(service));
    if (unused.length > 0) {
      throw new ValidationError(`Authentication source(s) \`${unused.join(', ')}\` unused by tool \`${name}\`.`, {
        tool: name,
        services: unused
      });
    }

    return this.derive({
      ...this.state,
      authTokenGetters: { ...this.state.authTokenGetters, ...normalizeSources(getters) }
    });
  }

  addAuthTokenGetter(service: string, getter: unknown): Self {
    return this.addAuthTokenGetters({ [service]: getter });
  }
}

/**
 * Header values must resolve to strings
 */
export function headerValue(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${label} did not resolve to a string`);
  }
  return value;
}

/**
 * Async proxy for a tool served by a transport
 */
export class RemoteTool extends ToolProxyBase<RemoteTool> {
  private readonly transport: BaseTransport;

  constructor(transport: BaseTransport, state: ToolProxyState) {
    super(state);
    this.transport = transport;
  }

  protected derive(state: ToolProxyState): RemoteTool {
    return new RemoteTool(this.transport, state);
  }

  /**
   * Invoke with named arguments
   */
  invoke(args: Readonly<Record<string, unknown>> = {}): Promise<string> {
    return this.execute([], args);
  }

  /**
   * Invoke with arguments in parameter order
   */
  invokePositional(...values: unknown[]): Promise<string> {
    return this.execute(values, {});
  }

  private async execute(positional: readonly unknown[], named: Readonly<Record<string, unknown>>): Promise<string> {
    const payload = this.prepareArguments(positional, named);

    for (const [param, source] of Object.entries(this.state.boundParams)) {
      payload[param] = await resolveValue(source);
    }

    const headers: Headers = {};
    for (const [header, source] of Object.entries(this.state.clientHeaders)) {
      headers[header] = headerValue(await resolveValue(source), `Client header '${header}'`);
    }
    for (const [service, source] of Object.entries(this.state.authTokenGetters)) {
      headers[authTokenHeader(service)] = headerValue(
        await resolveValue(source),
        `Auth token getter for '${service}'`
      );
    }

    this.warnIfInsecure();
    return this.transport.invokeTool(this.state.name, payload, headers);
  }
}

