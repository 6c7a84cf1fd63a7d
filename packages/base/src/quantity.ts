const BaseUnit = Symbol.for('@base-unit');

/**
 * All units, grouped by kinds. Each kind has a base unit which other units
 * in the same kind are relative to
 */
export const Taxonomy = {
  time: {
    [BaseUnit]: 'nanosecond',
    nanosecond: ['ns', 1],
    microsecond: ['us', 1e3],
    millisecond: ['ms', 1e6],
    second: ['s', 1e9],
  },
} satisfies Record<string, Record<string, [abbr: string, ratio: number]>>;

/** Each kind of unit */
export type Kind = keyof typeof Taxonomy;

/** Take the units of a given Kind */
export type UnitsOf<T extends Kind> = Extract<keyof (typeof Taxonomy)[T], string>;

/** All unit names */
export type Unit = UnitsOf<'time'>;

/** A symbol to tag quantities with a unit */
export const UnitTag = Symbol.for('@unit');

/** A measurement with a unit */
export type Quantity = {
  readonly [UnitTag]: Unit;
  scalar: number;
};

/** A converter from one unit to another */
export interface Converter {
  readonly from: Unit;

  /** Convert the given scalar in 'from' units to the given 'to' units */
  to(scalar: number, to: Unit): Quantity;
}

/** Produce a string representation for given quantities */
export interface Formatter {
  format(quantity: Quantity): string;
}

export interface FormatOptions extends Intl.NumberFormatOptions {
  /** Separator between the number and its unit */
  separator?: string;
  /** Prefix non-negative values with '+' */
  signed?: boolean;
}

export function create(unit: Unit, scalar: number): Quantity {
  return { [UnitTag]: unit, scalar };
}

export function convert(from: Unit): Converter {
  return Time.convert(from);
}

export function formatter(of: Kind, opts?: FormatOptions): Formatter {
  switch (of) {
    case 'time':
      return Time.formatter(opts);
  }
}

class Time {
  static convert(from: UnitsOf<'time'>): Converter {
    const toBase = Taxonomy.time[from][1];

    return {
      from,
      to(scalar: number, to: Unit) {
        return create(to, (toBase * scalar) / Taxonomy.time[to][1]);
      },
    };
  }

  static readonly defaultNumberFormatting: FormatOptions = { maximumFractionDigits: 2 };

  static formatter(opts = Time.defaultNumberFormatting): Formatter {
    const { separator = '', signed = false, ...numberOpts } = opts;
    return Time.#autoFormatter(new Intl.NumberFormat('en-US', numberOpts), separator, signed);
  }

  static toBase(from: Quantity): number {
    return Taxonomy.time[from[UnitTag]][1] * from.scalar;
  }

  /** Largest to smallest; the first unit not greater than the value is used */
  static #autoFmtIncrements: [suffix: string, ratio: number][] = [
    Taxonomy.time.second,
    Taxonomy.time.millisecond,
    Taxonomy.time.microsecond,
    Taxonomy.time.nanosecond,
  ];

  static #autoFormatter(f: Intl.NumberFormat, separator: string, signed: boolean): Formatter {
    function format(quantity: Quantity) {
      const ns = Time.toBase(quantity);
      const sign = ns < 0 || Object.is(ns, -0) ? '-' : signed ? '+' : '';
      const abs = Math.abs(ns);

      if (!Number.isFinite(abs)) {
        return sign + f.format(abs);
      }

      for (const [suffix, ratio] of Time.#autoFmtIncrements) {
        if (abs >= ratio || ratio === 1) {
          return sign + f.format(abs / ratio) + separator + suffix;
        }
      }

      return sign + f.format(abs) + separator + Taxonomy.time.nanosecond[0];
    }

    return {
      format,
    };
  }
}
