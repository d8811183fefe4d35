export { defineEnum } from './api/define-enum.js';
export type { EnumDefinition } from './api/define-enum.js';

export { EnumCatalog } from './catalog/enum-catalog.js';

export { BitMask } from './core/bitmask.js';
export { Enumeration } from './core/enumeration.js';
export { composeNameSources, explicitNameSource, scopeNameSource } from './core/name-source.js';
export type { DeclaringScope, NameSource } from './core/name-source.js';
export { SimpleEnumeration, SimpleValue } from './core/simple-enumeration.js';
export { EnumValue, invalidValueName } from './core/value.js';
export type { ValueFactory, ValueInit } from './core/value.js';
export { ValueSet } from './core/value-set.js';

export { isValueRef, isValueSetRef } from './types/types.js';
export type {
  CatalogedEnumeration,
  EnumerationConfig,
  RegisterOptions,
  ValueRef,
  ValueSetRef,
} from './types/types.js';

// Errors
export {
  CrossRegistryOperationError,
  DuplicateIdentifierError,
  EnumerationNameCollisionError,
  InvalidBitMaskError,
  InvalidEnumerationConfigError,
  InvalidIdentifierError,
  InvalidRegistrationError,
  UnknownEnumerationError,
  UnknownIdentifierError,
  UnknownNameError,
} from './errors/errors.js';
