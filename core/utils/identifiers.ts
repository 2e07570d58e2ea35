import { NamespaceNameError } from '@core/errors/NamespaceNameError';
import { IdentifierError } from '@core/errors/IdentifierError';
import type { IdentifierKind } from '@core/errors/IdentifierError';

// Lisp-flavoured identifiers: `inc`, `nil?`, `run!`, `pr-str`, `*module*`
const IDENTIFIER = /^[A-Za-z_$*+!?<>=/-][\w$*+!?<>=/-]*$/;

// One or more identifier segments joined by dots, no empty segments
const NAMESPACE_SEGMENT = /^[A-Za-z_$][\w$-]*$/;

// Assigning these on a plain object rewires it instead of adding a property
const RESERVED_IDENTIFIERS: ReadonlySet<string> = new Set(['__proto__']);

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_IDENTIFIERS.has(name);
}

export function isValidNamespaceName(name: string): boolean {
  if (name.length === 0) {
    return false;
  }
  return name.split('.').every(segment => NAMESPACE_SEGMENT.test(segment));
}

export function assertNamespaceName(name: string): void {
  if (!isValidNamespaceName(name)) {
    throw new NamespaceNameError(name);
  }
}

export function assertIdentifier(name: string, kind: IdentifierKind, namespace?: string): void {
  if (!isValidIdentifier(name)) {
    throw new IdentifierError(name, kind, namespace);
  }
}
