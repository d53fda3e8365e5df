/**
 * Sequence Format
 *
 * printf-style integer formatting for the variable part of object keys, and
 * the key namer built on it. Supports explicit (`%2$d`) and relative (`%<d`)
 * argument indexes; only integer conversions are accepted.
 */

import { ConfigurationError } from "../error";

/**
 * Default sequence format: `.<task:3>.<file:2>`.
 */
export const DEFAULT_SEQUENCE_FORMAT = ".%03d.%02d";

/**
 * Template that cannot format the given arguments.
 */
export class FormatError extends Error {
  public readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = "FormatError";
    this.offset = offset;
    Object.setPrototypeOf(this, FormatError.prototype);
  }
}

// %[index$|<][flags][width][.precision]conversion
const SPECIFIER = /%(\d+\$|<)?([-#+ 0,(]*)(\d+)?(\.\d+)?([a-zA-Z%])?/g;

interface Specifier {
  index: string | undefined;
  flags: string;
  width: number | undefined;
  precision: string | undefined;
  conversion: string;
  offset: number;
  text: string;
}

/**
 * Format integer arguments with a printf-style template.
 *
 * @throws FormatError on unsupported conversions, illegal flag combinations
 *   or references to arguments that were not supplied
 */
export function formatSequence(template: string, ...args: number[]): string {
  let out = "";
  let last = 0;
  let ordinary = 0;
  let previous = -1;

  for (const match of template.matchAll(SPECIFIER)) {
    const offset = match.index ?? 0;
    out += template.slice(last, offset);
    last = offset + match[0].length;

    const conversion = match[5];
    if (conversion === undefined) {
      throw new FormatError(`Unknown format conversion at offset ${offset}: '${match[0]}'`, offset);
    }

    const spec: Specifier = {
      index: match[1],
      flags: match[2],
      width: match[3] !== undefined ? Number(match[3]) : undefined,
      precision: match[4],
      conversion,
      offset,
      text: match[0],
    };

    if (conversion === "%" || conversion === "n") {
      checkLiteral(spec);
      out += conversion === "%" ? pad("%", spec) : "\n";
      continue;
    }

    if (!"doxX".includes(conversion)) {
      throw new FormatError(
        `Conversion '${conversion}' is not an integer conversion: '${spec.text}'`,
        offset
      );
    }

    let argIndex: number;
    if (spec.index === "<") {
      argIndex = previous;
    } else if (spec.index !== undefined) {
      argIndex = Number(spec.index.slice(0, -1)) - 1;
    } else {
      argIndex = ordinary++;
    }

    if (argIndex < 0 || argIndex >= args.length) {
      throw new FormatError(`Missing argument for format specifier '${spec.text}'`, offset);
    }
    previous = argIndex;

    out += formatInteger(args[argIndex], spec);
  }

  return out + template.slice(last);
}

function checkLiteral(spec: Specifier): void {
  if (spec.precision !== undefined) {
    throw new FormatError(`Precision not allowed: '${spec.text}'`, spec.offset);
  }
  if (spec.conversion === "n" && (spec.flags !== "" || spec.width !== undefined)) {
    throw new FormatError(`Flags and width not allowed: '${spec.text}'`, spec.offset);
  }
  if (spec.conversion === "%") {
    if (spec.flags.replace("-", "") !== "") {
      throw new FormatError(`Only '-' is allowed with '%%': '${spec.text}'`, spec.offset);
    }
    if (spec.flags.includes("-") && spec.width === undefined) {
      throw new FormatError(`Missing width: '${spec.text}'`, spec.offset);
    }
  }
}

function checkFlags(spec: Specifier): void {
  const { flags, conversion, width, text, offset } = spec;

  for (const flag of flags) {
    if (flags.indexOf(flag) !== flags.lastIndexOf(flag)) {
      throw new FormatError(`Duplicate flag '${flag}': '${text}'`, offset);
    }
  }
  if (spec.precision !== undefined) {
    throw new FormatError(`Precision not allowed for integers: '${text}'`, offset);
  }
  if ((flags.includes("-") || flags.includes("0")) && width === undefined) {
    throw new FormatError(`Missing width: '${text}'`, offset);
  }
  if (flags.includes("-") && flags.includes("0")) {
    throw new FormatError(`Flags '-' and '0' cannot be combined: '${text}'`, offset);
  }
  if (flags.includes("+") && flags.includes(" ")) {
    throw new FormatError(`Flags '+' and ' ' cannot be combined: '${text}'`, offset);
  }
  if (conversion === "d" && flags.includes("#")) {
    throw new FormatError(`Flag '#' not allowed with 'd': '${text}'`, offset);
  }
  if (conversion !== "d" && /[+ ,(]/.test(flags)) {
    throw new FormatError(`Flags '${flags}' not allowed with '${conversion}': '${text}'`, offset);
  }
}

function formatInteger(value: number, spec: Specifier): string {
  checkFlags(spec);

  if (!Number.isInteger(value)) {
    throw new FormatError(`Argument ${value} is not an integer`, spec.offset);
  }

  const { flags, conversion } = spec;

  if (conversion !== "d") {
    // Negative values print as 32-bit two's complement.
    const magnitude = value < 0 ? value >>> 0 : value;
    let digits = magnitude.toString(conversion === "o" ? 8 : 16);
    if (conversion === "X") {
      digits = digits.toUpperCase();
    }
    let prefix = "";
    if (flags.includes("#")) {
      prefix = conversion === "o" ? "0" : conversion === "x" ? "0x" : "0X";
    }
    return zeroPadOrPad(prefix, digits, "", spec);
  }

  const negative = value < 0;
  let digits = Math.abs(value).toString();
  if (flags.includes(",")) {
    digits = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  }

  let prefix = "";
  let suffix = "";
  if (negative) {
    if (flags.includes("(")) {
      prefix = "(";
      suffix = ")";
    } else {
      prefix = "-";
    }
  } else if (flags.includes("+")) {
    prefix = "+";
  } else if (flags.includes(" ")) {
    prefix = " ";
  }

  return zeroPadOrPad(prefix, digits, suffix, spec);
}

function zeroPadOrPad(prefix: string, digits: string, suffix: string, spec: Specifier): string {
  const width = spec.width ?? 0;
  if (spec.flags.includes("0")) {
    const fill = width - prefix.length - digits.length - suffix.length;
    return prefix + "0".repeat(Math.max(fill, 0)) + digits + suffix;
  }
  return pad(prefix + digits + suffix, spec);
}

function pad(text: string, spec: Specifier): string {
  const width = spec.width ?? 0;
  if (text.length >= width) {
    return text;
  }
  return spec.flags.includes("-") ? text.padEnd(width) : text.padStart(width);
}

/**
 * Check that a sequence format can render a (task index, file index) pair.
 *
 * Run at transaction time, so a broken template fails the job before any
 * data is written.
 */
export function validateSequenceFormat(template: string): void {
  try {
    formatSequence(template, 0, 0);
  } catch (error) {
    if (error instanceof FormatError) {
      throw new ConfigurationError(
        `Invalid sequence_format: parameter for file output plugin: ${error.message}`,
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Derives object keys from task and file indexes.
 */
export class KeyNamer {
  readonly pathPrefix: string;
  readonly sequenceFormat: string;
  readonly fileExt: string;

  constructor(pathPrefix: string, sequenceFormat: string, fileExt: string) {
    this.pathPrefix = pathPrefix;
    this.sequenceFormat = sequenceFormat;
    this.fileExt = fileExt;
  }

  buildKey(taskIndex: number, fileIndex: number): string {
    return this.pathPrefix + formatSequence(this.sequenceFormat, taskIndex, fileIndex) + this.fileExt;
  }
}

/**
 * Whether a key has a `.` or `..` path segment.
 */
export function hasDotSegment(key: string): boolean {
  return key.split("/").some((segment) => segment === "." || segment === "..");
}

/**
 * Check that the keys of a template cannot contain `.` or `..` segments.
 *
 * Request URLs drop dot segments, so such a key would be written somewhere
 * else. Formatted numbers never produce a dot-only segment, so the key of
 * `(0, 0)` stands for every key of the template.
 */
export function validateKeyLayout(pathPrefix: string, sequenceFormat: string, fileExt: string): void {
  validateSequenceFormat(sequenceFormat);
  const key = new KeyNamer(pathPrefix, sequenceFormat, fileExt).buildKey(0, 0);
  if (hasDotSegment(key)) {
    throw new ConfigurationError(
      `Invalid path_prefix, sequence_format or file_ext: object keys must not contain '.' or '..' path segments (e.g. '${key}')`
    );
  }
}
