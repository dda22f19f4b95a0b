/**
 * OAuth Message
 *
 * Parameter set shared by requests and responses. A parameter holds a single
 * string or an ordered list of strings (repeated query/form keys).
 */

import { PARAMETERS } from '@endsession/lib-core';

export type ParameterValue = string | string[];

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function copyValue(value: ParameterValue): ParameterValue {
  return typeof value === 'string' ? value : [...value];
}

export class OAuthMessage {
  private readonly parameters = new Map<string, ParameterValue>();

  constructor(init?: Record<string, ParameterValue | null | undefined>) {
    if (init) {
      for (const [name, value] of Object.entries(init)) {
        this.set(name, value);
      }
    }
  }

  /**
   * Build a message from query or form parameters. Repeated keys become an
   * ordered list.
   */
  static fromSearchParams(params: URLSearchParams): OAuthMessage {
    const message = new OAuthMessage();
    for (const name of new Set(params.keys())) {
      const values = params.getAll(name);
      message.set(name, values.length === 1 ? values[0] : values);
    }
    return message;
  }

  get(name: string): ParameterValue | undefined {
    const value = this.parameters.get(name);
    return value === undefined ? undefined : copyValue(value);
  }

  /**
   * First value of a parameter, whether it holds one value or a list.
   */
  getString(name: string): string | undefined {
    const value = this.parameters.get(name);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    return value[0];
  }

  /**
   * Set a parameter; `null` or `undefined` removes it.
   */
  set(name: string, value: ParameterValue | null | undefined): this {
    if (value === null || value === undefined) {
      this.parameters.delete(name);
    } else {
      this.parameters.set(name, copyValue(value));
    }
    return this;
  }

  has(name: string): boolean {
    return this.parameters.has(name);
  }

  remove(name: string): boolean {
    return this.parameters.delete(name);
  }

  get names(): string[] {
    return Array.from(this.parameters.keys());
  }

  get count(): number {
    return this.parameters.size;
  }

  toJSON(): Record<string, ParameterValue> {
    const result: Record<string, ParameterValue> = {};
    for (const [name, value] of this.parameters) {
      result[name] = copyValue(value);
    }
    return result;
  }

  /**
   * Write every parameter into the query of a URL, replacing any parameter of
   * the same name the URL already carries.
   */
  appendTo(url: URL): URL {
    for (const [name, value] of this.parameters) {
      url.searchParams.delete(name);
      for (const item of typeof value === 'string' ? [value] : value) {
        url.searchParams.append(name, item);
      }
    }
    return url;
  }

  get state(): string | undefined {
    return this.getString(PARAMETERS.STATE);
  }

  set state(value: string | undefined) {
    this.set(PARAMETERS.STATE, value);
  }

  get postLogoutRedirectUri(): string | undefined {
    return this.getString(PARAMETERS.POST_LOGOUT_REDIRECT_URI);
  }

  set postLogoutRedirectUri(value: string | undefined) {
    this.set(PARAMETERS.POST_LOGOUT_REDIRECT_URI, value);
  }

  get error(): string | undefined {
    return this.getString(PARAMETERS.ERROR);
  }

  set error(value: string | undefined) {
    this.set(PARAMETERS.ERROR, value);
  }

  get errorDescription(): string | undefined {
    return this.getString(PARAMETERS.ERROR_DESCRIPTION);
  }

  set errorDescription(value: string | undefined) {
    this.set(PARAMETERS.ERROR_DESCRIPTION, value);
  }

  get errorUri(): string | undefined {
    return this.getString(PARAMETERS.ERROR_URI);
  }

  set errorUri(value: string | undefined) {
    this.set(PARAMETERS.ERROR_URI, value);
  }
}
