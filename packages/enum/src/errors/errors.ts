const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * Registration with an id that another value of the same enumeration holds.
 */
export class DuplicateIdentifierError extends Error {
  constructor(
    public enumeration: string,
    public id: number,
    public existing: string
  ) {
    const dev = [
      `Duplicate id ${id} in enumeration '${enumeration}'.`,
      '',
      `Id ${id} is already assigned to '${existing}'.`,
      'Ids are never reassigned; the registration was rejected and nothing changed.',
      '',
      'To fix this:',
      `  1. Drop the explicit id and let '${enumeration}' assign the next free one`,
      `  2. Or pick an id that is not taken yet`,
    ];
    super(format(`Duplicate id ${id} in enumeration '${enumeration}'.`, dev));
    this.name = 'DuplicateIdentifierError';
  }
}

/**
 * Lookup by id with no value registered under it.
 */
export class UnknownIdentifierError extends Error {
  constructor(
    public enumeration: string,
    public id: number,
    public minId: number,
    public maxId: number
  ) {
    const dev = [
      `No value with id ${id} in enumeration '${enumeration}'.`,
      '',
      `Registered ids lie within [${minId}, ${maxId}).`,
    ];
    super(format(`No value with id ${id} in enumeration '${enumeration}'.`, dev));
    this.name = 'UnknownIdentifierError';
  }
}

/**
 * Name lookup that matched nothing after names were populated.
 */
export class UnknownNameError extends Error {
  constructor(
    public enumeration: string,
    public valueName: string,
    public available: string[]
  ) {
    const parts: string[] = [`No value found for '${valueName}' in enumeration '${enumeration}'.`, ''];

    if (available.length > 0 && available.length <= 10) {
      parts.push('Known names:');
      available.forEach((n) => parts.push(`  - ${n}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} names are known.`, '');
    }

    parts.push('Names come from explicit names given at registration and from the');
    parts.push(`name sources bound to '${enumeration}' (declare(), bindScope(), nameSource).`);

    super(format(`No value found for '${valueName}' in enumeration '${enumeration}'.`, parts));
    this.name = 'UnknownNameError';
  }
}

/**
 * Set algebra or membership change mixing two different enumerations.
 */
export class CrossRegistryOperationError extends Error {
  constructor(
    public operation: string,
    public left: string,
    public right: string
  ) {
    const dev = [
      `Cannot ${operation} across enumerations.`,
      '',
      `Left operand belongs to '${left}', right operand belongs to '${right}'.`,
      'A ValueSet only ever holds values of the enumeration that built it.',
      '',
      'To fix this:',
      `  - Use mapGeneric()/flatMapGeneric() to leave the specialized set`,
      `  - Or convert with toArray() before combining values of different enumerations`,
    ];
    super(format(`Cannot ${operation} across enumerations '${left}' and '${right}'.`, dev));
    this.name = 'CrossRegistryOperationError';
  }
}

export class InvalidIdentifierError extends Error {
  constructor(
    public enumeration: string,
    public id: unknown
  ) {
    const dev = [
      'Invalid value id',
      '',
      `Enumeration '${enumeration}' received id ${String(id)}.`,
      'Ids must be safe integers (Number.isSafeInteger).',
    ];
    super(format(`Invalid id ${String(id)} for enumeration '${enumeration}'.`, dev));
    this.name = 'InvalidIdentifierError';
  }
}

export class InvalidRegistrationError extends Error {
  constructor(
    public enumeration: string,
    public reason: string
  ) {
    const dev = [
      'Invalid registration',
      '',
      `Registration into '${enumeration}' was rejected: ${reason}`,
      '',
      'Value factories must build exactly one value from the init they receive:',
      `  ${enumeration}.register((init) => new MyValue(init))`,
    ];
    super(format(`Invalid registration into '${enumeration}': ${reason}`, dev));
    this.name = 'InvalidRegistrationError';
  }
}

export class InvalidBitMaskError extends Error {
  constructor(public reason: string) {
    const dev = [
      'Invalid bit mask',
      '',
      reason,
      '',
      'A bit mask is an array of unsigned 32-bit integers; bit k of the',
      'concatenated words marks membership of id (minId + k).',
    ];
    super(format(`Invalid bit mask: ${reason}`, dev));
    this.name = 'InvalidBitMaskError';
  }
}

export class InvalidEnumerationConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid enumeration configuration', '', `Invalid enumeration configuration: ${reason}`];
    super(format(`Invalid enumeration configuration: ${reason}`, dev));
    this.name = 'InvalidEnumerationConfigError';
  }
}

export class EnumerationNameCollisionError extends Error {
  constructor(
    public enumeration: string,
    public namespace: string
  ) {
    const dev = [
      'Enumeration name collision',
      '',
      `Catalog namespace '${namespace}' already holds a different enumeration named '${enumeration}'.`,
      '',
      'To fix this:',
      `  1. Give one of the enumerations another name`,
      `  2. Or add it to a separate catalog namespace`,
    ];
    super(format(`Enumeration '${enumeration}' already cataloged in '${namespace}'.`, dev));
    this.name = 'EnumerationNameCollisionError';
  }
}

/**
 * Revival of a serialized value whose enumeration is not cataloged.
 */
export class UnknownEnumerationError extends Error {
  constructor(
    public enumeration: string,
    public namespace: string,
    public available: string[]
  ) {
    const dev = [
      `Enumeration '${enumeration}' is not cataloged in '${namespace}'.`,
      '',
      ...(available.length > 0
        ? ['Cataloged enumerations:', ...available.map((n) => `  - ${n}`)]
        : [`Catalog namespace '${namespace}' is empty.`]),
      '',
      `Call EnumCatalog.add(${enumeration}) before reviving its values.`,
    ];
    super(format(`Enumeration '${enumeration}' is not cataloged in '${namespace}'.`, dev));
    this.name = 'UnknownEnumerationError';
  }
}
