import type { Verb } from '../interfaces/http-engine.js';

/**
 * UrlNotSetError
 * Thrown when a request has neither a relative nor an absolute URL configured
 */
export class UrlNotSetError extends Error {
  constructor(message = "Request URL is not set: configure either a relative url or a custom url") {
    super(message);
    Object.setPrototypeOf(this, UrlNotSetError.prototype);
    this.name = "UrlNotSetError";
  }
}

/**
 * MissingBodyError
 * Thrown at build time when a verb that requires a body (POST, PUT) has none
 */
export class MissingBodyError extends Error {
  readonly verb: Verb;

  constructor(verb: Verb) {
    super(`Can't send ${verb} without body`);
    Object.setPrototypeOf(this, MissingBodyError.prototype);
    this.name = "MissingBodyError";
    this.verb = verb;
  }
}

/**
 * UnknownMethodError
 * Thrown when a method definition uses a kind nobody registered.
 * Indicates a configuration bug rather than a runtime condition.
 */
export class UnknownMethodError extends Error {
  readonly kind: string;

  constructor(kind: string) {
    super(`Method kind '${kind}' is not registered`);
    Object.setPrototypeOf(this, UnknownMethodError.prototype);
    this.name = "UnknownMethodError";
    this.kind = kind;
  }
}

/**
 * KeyNotFoundError
 * Thrown when a params entry, a named params bag or a modification is missing
 */
export class KeyNotFoundError extends Error {
  readonly key: string;
  readonly container: string;

  constructor(key: string, container: string) {
    super(`Key '${key}' not found in ${container}`);
    Object.setPrototypeOf(this, KeyNotFoundError.prototype);
    this.name = "KeyNotFoundError";
    this.key = key;
    this.container = container;
  }
}

/**
 * SessionInterruptedError
 * Thrown by response inspection helpers when the session is no longer authorized
 */
export class SessionInterruptedError extends Error {
  readonly status?: number;

  constructor(message = "Is unauthorized", status?: number) {
    super(message);
    Object.setPrototypeOf(this, SessionInterruptedError.prototype);
    this.name = "SessionInterruptedError";
    this.status = status;
  }
}

/**
 * ProcessorStoppedError
 * Thrown when a params processor that already ran its loop is asked to run again
 */
export class ProcessorStoppedError extends Error {
  readonly state: string;

  constructor(state: string) {
    super(`Params processor already ran (state: ${state}); create a new processor`);
    Object.setPrototypeOf(this, ProcessorStoppedError.prototype);
    this.name = "ProcessorStoppedError";
    this.state = state;
  }
}

/**
 * ValidationError
 * Thrown when configuration, method definitions or mapped results fail validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
  }
}
