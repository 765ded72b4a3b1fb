/**
 * Literal Renderer - schema default values as C# expressions
 *
 * A default that has no constant C# rendering (objects, non-empty arrays, values
 * out of range for the member type) yields undefined and no initializer is emitted.
 */

import type {
  DefaultExpression,
  EnumerationDeclaration,
  PrimitiveKind,
  ResolvedType,
} from '../../types/declarations.js';
import type { JsonValue } from '../../types/schema.js';
import { quoteString } from './escape.js';

export { quoteString } from './escape.js';

export interface LiteralContext {
  /** Namespace qualifying enumeration member references; empty for none */
  namespace: string;
  enumeration(name: string): EnumerationDeclaration | undefined;
}

/** Initializer used when defaults are not propagated */
export const PLACEHOLDER_DEFAULT: DefaultExpression = { kind: 'placeholder', code: 'null!' };

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const FLOAT_MAX = 3.4028234663852886e38;
const DECIMAL_MAX = 7.922816251426434e28;

const DATE_TIME = /^\d{4}-\d{2}-\d{2}([Tt ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?([Zz]|[+-]\d{2}(:?\d{2})?)?)?$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_ONLY = /^\d{2}:\d{2}(:\d{2}(\.\d{1,7})?)?$/;
const ISO_DURATION = /^-?P(?=\d|T\d)(\d+Y)?(\d+M)?(\d+W)?(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+(\.\d+)?S)?)?$/;
const TIMESPAN = /^-?(\d+\.)?\d{1,2}:\d{2}(:\d{2}(\.\d{1,7})?)?$/;
const UUID = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

function literal(code: string): DefaultExpression {
  return { kind: 'literal', code };
}

function construct(code: string): DefaultExpression {
  return { kind: 'construct', code };
}

function renderNumber(value: JsonValue, kind: PrimitiveKind): DefaultExpression | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  const digits = String(value);
  // String(-0) drops the sign bit the floating kinds keep
  const fractional = Object.is(value, -0) ? '-0' : digits;

  switch (kind) {
    case 'int32':
      return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX ? literal(digits) : undefined;
    case 'int64':
      return Number.isSafeInteger(value) ? literal(`${digits}L`) : undefined;
    case 'float':
      return Math.abs(value) <= FLOAT_MAX ? literal(`${fractional}f`) : undefined;
    case 'double':
      return literal(`${fractional}d`);
    case 'decimal':
      return Math.abs(value) < DECIMAL_MAX ? literal(`${fractional}m`) : undefined;
    default:
      return undefined;
  }
}

function renderFormattedString(value: string, kind: PrimitiveKind): DefaultExpression | undefined {
  const quoted = quoteString(value);

  switch (kind) {
    case 'string':
      return literal(quoted);
    case 'dateTime':
      return !DATE_TIME.test(value) || Number.isNaN(Date.parse(value))
        ? undefined
        : construct(`DateTimeOffset.Parse(${quoted}, CultureInfo.InvariantCulture, DateTimeStyles.AdjustToUniversal)`);
    case 'date':
      return DATE_ONLY.test(value) ? construct(`DateOnly.Parse(${quoted}, CultureInfo.InvariantCulture)`) : undefined;
    case 'time':
      return TIME_ONLY.test(value) ? construct(`TimeOnly.Parse(${quoted}, CultureInfo.InvariantCulture)`) : undefined;
    case 'duration':
      if (ISO_DURATION.test(value)) {
        return construct(`XmlConvert.ToTimeSpan(${quoted})`);
      }
      return TIMESPAN.test(value) ? construct(`TimeSpan.Parse(${quoted}, CultureInfo.InvariantCulture)`) : undefined;
    case 'uuid':
      return UUID.test(value) ? construct(`Guid.Parse(${quoted})`) : undefined;
    case 'uri':
      return URL.canParse(value) ? construct(`new Uri(${quoteString(new URL(value).href)})`) : undefined;
    default:
      return undefined;
  }
}

function renderPrimitive(value: JsonValue, kind: PrimitiveKind): DefaultExpression | undefined {
  if (kind === 'boolean') {
    return typeof value === 'boolean' ? literal(value ? 'true' : 'false') : undefined;
  }
  if (typeof value === 'string') {
    return renderFormattedString(value, kind);
  }
  return renderNumber(value, kind);
}

function renderEnumMember(
  value: JsonValue,
  name: string,
  context: LiteralContext,
): DefaultExpression | undefined {
  const enumeration = context.enumeration(name);
  const member = enumeration?.members.find((candidate) => candidate.value === value);
  if (member === undefined) {
    return undefined;
  }
  const qualifier = context.namespace.length > 0 ? `${context.namespace}.${name}` : name;
  return { kind: 'enumMember', code: `${qualifier}.${member.name}` };
}

/**
 * Render `value` as an initializer for a member of type `type`
 */
export function renderDefault(
  value: JsonValue | undefined,
  type: ResolvedType,
  context: LiteralContext,
): DefaultExpression | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  switch (type.kind) {
    case 'nullable':
      return renderDefault(value, type.inner, context);
    case 'primitive':
      return renderPrimitive(value, type.primitive);
    case 'reference':
      return renderEnumMember(value, type.name, context);
    case 'collection':
      return Array.isArray(value) && value.length === 0 ? { kind: 'emptyCollection', code: '[]' } : undefined;
    case 'map':
      return undefined;
  }
}

/**
 * Member initializer honouring `propagateDefaults`: when off, any member that
 * would get an expression gets {@link PLACEHOLDER_DEFAULT} instead.
 */
export function renderMemberDefault(
  value: JsonValue | undefined,
  type: ResolvedType,
  context: LiteralContext,
  propagateDefaults: boolean,
): DefaultExpression | undefined {
  const rendered = renderDefault(value, type, context);
  if (rendered === undefined || propagateDefaults) {
    return rendered;
  }
  return PLACEHOLDER_DEFAULT;
}
