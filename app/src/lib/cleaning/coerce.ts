const currencyNumberPattern =
  /^([-+]?)[$€£]?([-+]?)(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?([eE][-+]?\d+)?$/;

export type ParsedNumber = {
  value: number;
  integral: boolean;
};

/**
 * Reads plain and currency-formatted numbers: `42`, `-3.5`, `1e3`,
 * `$1,234.50`, `-€12`. Thousands separators must be well formed.
 */
export const parseNumericText = (text: string): ParsedNumber | null => {
  const match = currencyNumberPattern.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, leadingSign, innerSign, digits, fraction, exponent] = match;
  if (leadingSign && innerSign) {
    return null;
  }
  const sign = leadingSign || innerSign;
  const value = Number(`${sign}${digits.replace(/,/g, "")}${fraction ?? ""}${exponent ?? ""}`);
  if (!Number.isFinite(value)) {
    return null;
  }
  const integral = fraction === undefined && exponent === undefined;
  // integers past 2^53 cannot be held exactly
  if (integral && !Number.isSafeInteger(value)) {
    return null;
  }
  return { value: Object.is(value, -0) ? 0 : value, integral };
};

type DateOrder = "ymd" | "mdy" | "dmy";

export type DateFormat = {
  name: string;
  order: DateOrder;
  pattern: RegExp;
};

const TIME_SUFFIX = String.raw`(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?Z?`;

const withTime = (datePart: string): RegExp => new RegExp(`^${datePart}${TIME_SUFFIX}$`);

// Month-first formats are tried before day-first ones for ambiguous values.
export const DATE_FORMATS: readonly DateFormat[] = [
  { name: "YYYY-MM-DD", order: "ymd", pattern: withTime(String.raw`(\d{4})-(\d{1,2})-(\d{1,2})`) },
  { name: "YYYY/MM/DD", order: "ymd", pattern: withTime(String.raw`(\d{4})/(\d{1,2})/(\d{1,2})`) },
  { name: "MM/DD/YYYY", order: "mdy", pattern: withTime(String.raw`(\d{1,2})/(\d{1,2})/(\d{4})`) },
  { name: "MM-DD-YYYY", order: "mdy", pattern: withTime(String.raw`(\d{1,2})-(\d{1,2})-(\d{4})`) },
  { name: "DD/MM/YYYY", order: "dmy", pattern: withTime(String.raw`(\d{1,2})/(\d{1,2})/(\d{4})`) },
  { name: "DD-MM-YYYY", order: "dmy", pattern: withTime(String.raw`(\d{1,2})-(\d{1,2})-(\d{4})`) },
  { name: "DD.MM.YYYY", order: "dmy", pattern: withTime(String.raw`(\d{1,2})\.(\d{1,2})\.(\d{4})`) }
];

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const toNumber = (value: string | undefined): number => (value === undefined ? 0 : Number(value));

export const parseDateWithFormat = (text: string, format: DateFormat): Date | null => {
  const match = format.pattern.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, firstPart, secondPart, thirdPart, hours, minutes, seconds, millis] = match;
  const parts = [Number(firstPart), Number(secondPart), Number(thirdPart)];
  const [year, month, day] =
    format.order === "ymd"
      ? parts
      : format.order === "mdy"
        ? [parts[2], parts[0], parts[1]]
        : [parts[2], parts[1], parts[0]];

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  const hour = toNumber(hours);
  const minute = toNumber(minutes);
  const second = toNumber(seconds);
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const millisecond = millis === undefined ? 0 : Number(millis.padEnd(3, "0"));
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year);
  return date;
};

export const inferDateFormat = (text: string): DateFormat | null =>
  DATE_FORMATS.find((format) => parseDateWithFormat(text, format) !== null) ?? null;
