import { serializeCsvRows } from "../cleaning/serializeCsv";
import {
  createRandom,
  randomChoice,
  randomInt,
  randomUniform,
  type RandomSource
} from "../sample/random";

export type NoisyRow = {
  id: number;
  name: string | null;
  email: string | null;
  date: string | null;
  score: string | number | null;
  amount: string | number;
  category: string;
};

export const NOISY_COLUMNS = ["id", "name", "email", "date", "score", "amount", "category"] as const;

const FIRST_NAMES = [
  "Alex", "Jordan", "Taylor", "Morgan", "Casey", "Riley", "Chris", "Sam",
  "Jamie", "Lee", "Robin", "Avery", "Parker", "Quinn", "Drew"
] as const;

const LAST_NAMES = [
  "Smith", "Johnson", "Williams", "Brown", "Jones", "Miller", "Davis",
  "Garcia", "Rodriguez", "Wilson", "Martinez", "Anderson", "Taylor"
] as const;

const EMAIL_PROVIDERS = ["example.com", "mail.com", "sample.org", "test.net"] as const;

const CATEGORIES = ["Retail", "retail", "ONLINE", "Wholesale", "wholesale", "e-comm", "E-Commerce"] as const;

const BAD_SCORES = ["NA", "", "null", "abc"] as const;

type DateLayout = (year: string, month: string, day: string) => string;

const DATE_LAYOUTS: readonly DateLayout[] = [
  (year, month, day) => `${year}-${month}-${day}`,
  (year, month, day) => `${day}/${month}/${year}`,
  (year, month, day) => `${month}-${day}-${year}`,
  (year, month, day) => `${year}/${month}/${day}`
];

const START_DATE_UTC = Date.UTC(2020, 0, 1);
const DAY_MS = 86_400_000;
const MISSING_RATE = 0.03;
const DUPLICATE_RATE = 0.01;

const randomName = (random: RandomSource): string => {
  let name = `${randomChoice(random, FIRST_NAMES)} ${randomChoice(random, LAST_NAMES)}`;
  if (random() < 0.25) {
    name = name.toUpperCase();
  }
  if (random() < 0.25) {
    name = name.toLowerCase();
  }
  if (random() < 0.25) {
    name = `  ${name}  `;
  }
  return name;
};

const randomEmail = (name: string, random: RandomSource): string => {
  const base = name.replace(/ /g, ".").trim().toLowerCase();
  let email = `${base}@${randomChoice(random, EMAIL_PROVIDERS)}`;
  const roll = random();
  if (roll < 0.05) {
    email = email.replace(/@/g, "");
  } else if (roll < 0.1) {
    email = email.replace(/\./g, " ");
  }
  if (random() < 0.2) {
    email = email.toUpperCase();
  }
  if (random() < 0.2) {
    email = ` ${email} `;
  }
  return email;
};

const randomDate = (random: RandomSource): string => {
  const date = new Date(START_DATE_UTC + randomInt(random, 0, 5 * 365) * DAY_MS);
  const year = date.getUTCFullYear().toString();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  const text = randomChoice(random, DATE_LAYOUTS)(year, month, day);
  // occasional impossible month
  if (random() < 0.01 && text.includes("-03-")) {
    return text.replace("-03-", "-13-");
  }
  return text;
};

const randomCategory = (random: RandomSource): string => {
  const base = randomChoice(random, CATEGORIES);
  return random() < 0.2 ? ` ${base} ` : base;
};

const randomScore = (random: RandomSource): string | number => {
  const roll = random();
  if (roll < 0.75) {
    const value = randomInt(random, 0, 100);
    return random() < 0.3 ? value.toString() : value;
  }
  if (roll < 0.85) {
    return randomChoice(random, BAD_SCORES);
  }
  return randomInt(random, 300, 5000);
};

const groupThousands = (digits: string): string => digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");

const randomAmount = (random: RandomSource): string | number => {
  const amount = randomUniform(random, 5, 2000);
  if (random() < 0.5) {
    const [whole, cents] = amount.toFixed(2).split(".");
    return `$${groupThousands(whole)}.${cents}`;
  }
  if (random() < 0.2) {
    return ` ${amount.toFixed(0)} `;
  }
  return Math.round(amount * 100) / 100;
};

const MISSABLE: ReadonlyArray<"name" | "email" | "date" | "score"> = ["name", "email", "date", "score"];

/**
 * Rows with deliberate quality problems. The same `(count, seed)` always
 * yields the same rows; duplicates are extra rows, so the result may be
 * longer than `count`.
 */
export const generateNoisyRows = (count: number, seed: number): NoisyRow[] => {
  const random = createRandom(seed);
  const rows: NoisyRow[] = [];
  for (let id = 1; id <= count; id += 1) {
    const name = randomName(random);
    const row: NoisyRow = {
      id,
      name,
      email: randomEmail(name, random),
      date: randomDate(random),
      score: randomScore(random),
      amount: randomAmount(random),
      category: randomCategory(random)
    };

    MISSABLE.forEach((key) => {
      if (random() < MISSING_RATE) {
        row[key] = random() < 0.5 ? "" : null;
      }
    });

    rows.push(row);
    if (random() < DUPLICATE_RATE) {
      rows.push({ ...row });
    }
  }
  return rows;
};

const toField = (value: string | number | null): string => (value === null ? "" : String(value));

export const renderNoisyCsv = (count: number, seed: number): string =>
  serializeCsvRows(
    [...NOISY_COLUMNS],
    generateNoisyRows(count, seed).map((row) => NOISY_COLUMNS.map((column) => toField(row[column])))
  );
