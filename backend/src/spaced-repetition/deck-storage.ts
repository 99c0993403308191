/**
 * Deck Storage
 *
 * File operations for reading and writing CSV deck files.
 * Each row is one card; unknown columns are carried through untouched.
 *
 * Required columns: front, back, next_review_date, interval_days
 * Optional columns: ease_factor, lapses, reviews
 *
 * Writes are atomic via the temp+rename pattern.
 */

import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { DeckError, DecksDirError } from "../errors";
import { deckLog as log } from "../logger";
import {
  type CalendarDate,
  type CardRecord,
  type DeckCard,
  MAX_INTERVAL_DAYS,
  parseDate,
  roundTo,
} from "./card-schema";
import { parseCsv, serializeCsv } from "./csv";
import { EASE_PRECISION, INTERVAL_PRECISION } from "./scheduler";
import { DEFAULT_POLICY, type SchedulerPolicy } from "./scheduler-policy";

// =============================================================================
// Constants
// =============================================================================

/** Columns every deck must have */
export const CORE_COLUMNS = ["front", "back", "next_review_date", "interval_days"] as const;

/** Scheduling columns that default when absent */
export const SRS_COLUMNS = ["ease_factor", "lapses", "reviews"] as const;

/** Columns written first when no usable header exists */
export const BASE_COLUMNS: readonly string[] = [...CORE_COLUMNS, ...SRS_COLUMNS];

/** File extension for deck files */
export const DECK_EXTENSION = ".csv";

/** Deck written when the decks directory is created */
export const EXAMPLE_DECK_NAME = "example_deck.csv";

// =============================================================================
// Types
// =============================================================================

export interface LoadedDeck {
  name: string;
  header: string[];
  cards: DeckCard[];
  warnings: string[];
}

export type ParseDeckResult =
  | ({ success: true } & LoadedDeck)
  | { success: false; error: string };

// =============================================================================
// Field Parsing
// =============================================================================

/**
 * Parse a numeric CSV field. Returns null for empty or non-numeric text.
 */
function parseNumber(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? "";
  if (trimmed === "") {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a count field, accepting float text such as "2.0".
 */
function parseCount(value: string | undefined): number {
  const parsed = parseNumber(value);
  return parsed === null ? 0 : Math.max(0, Math.trunc(parsed));
}

// =============================================================================
// Deck Parsing
// =============================================================================

/**
 * Parse deck file content into cards.
 *
 * Rows without front or back are skipped with a warning. A missing or
 * invalid due date marks the card as new and due today.
 *
 * @param content - Raw CSV content
 * @param deckName - Deck file name, recorded on every card
 * @param today - Date given to new cards
 * @param policy - Scheduling constants used for defaults and floors
 */
export function parseDeck(
  content: string,
  deckName: string,
  today: CalendarDate,
  policy: SchedulerPolicy = DEFAULT_POLICY
): ParseDeckResult {
  const parsed = parseCsv(content);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }

  const [header, ...dataRows] = parsed.rows;
  if (!header || header.every((column) => column.trim() === "")) {
    return { success: false, error: "Deck appears to be empty or has no header" };
  }

  const missing = CORE_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    return { success: false, error: `Deck is missing required columns: ${missing.join(", ")}` };
  }

  const warnings: string[] = [];
  const cards: DeckCard[] = [];

  dataRows.forEach((row, index) => {
    const line = index + 2;
    const fields = new Map<string, string>();
    header.forEach((column, columnIndex) => {
      fields.set(column, row[columnIndex] ?? "");
    });

    const front = (fields.get("front") ?? "").trim();
    const back = (fields.get("back") ?? "").trim();
    if (!front || !back) {
      warnings.push(`Skipping row ${line} in '${deckName}': missing front or back`);
      return;
    }

    const dateText = (fields.get("next_review_date") ?? "").trim();
    const date = dateText ? parseDate(dateText) : null;
    if (dateText && !date) {
      warnings.push(`Invalid date '${dateText}' on row ${line} in '${deckName}'. Treating as due.`);
    }
    const isNew = date === null;

    let interval = 0;
    if (!isNew) {
      const parsedInterval = parseNumber(fields.get("interval_days"));
      if (parsedInterval === null) {
        warnings.push(
          `Invalid interval '${fields.get("interval_days") ?? ""}' on row ${line} in '${deckName}'. Using ${policy.initialIntervalDays} days.`
        );
        interval = policy.initialIntervalDays;
      } else if (parsedInterval > MAX_INTERVAL_DAYS) {
        warnings.push(
          `Interval '${parsedInterval}' on row ${line} in '${deckName}' is too long. Using ${MAX_INTERVAL_DAYS} days.`
        );
        interval = MAX_INTERVAL_DAYS;
      } else {
        interval = Math.max(policy.minIntervalDays, parsedInterval);
      }
    }

    const ease = Math.max(policy.minEase, parseNumber(fields.get("ease_factor")) ?? policy.defaultEase);

    const extras = new Map<string, string>();
    for (const [column, value] of fields) {
      if (!BASE_COLUMNS.includes(column)) {
        extras.set(column, value);
      }
    }

    cards.push({
      id: randomUUID(),
      deck: deckName,
      front,
      back,
      next_review_date: isNew ? today : dateText,
      interval_days: roundTo(interval, INTERVAL_PRECISION),
      ease_factor: roundTo(ease, EASE_PRECISION),
      lapses: parseCount(fields.get("lapses")),
      reviews: parseCount(fields.get("reviews")),
      extras,
    });
  });

  return { success: true, name: deckName, header, cards, warnings };
}

// =============================================================================
// Deck Serialization
// =============================================================================

/**
 * Work out the column order for a save.
 *
 * An existing header that has every core column keeps its order, with new
 * columns appended. Otherwise base columns come first, then extra columns
 * sorted by name.
 */
export function resolveHeader(
  cards: readonly CardRecord[],
  existingHeader: readonly string[] | null
): string[] {
  const extraColumns = new Set<string>();
  for (const card of cards) {
    for (const column of card.extras.keys()) {
      if (!BASE_COLUMNS.includes(column)) {
        extraColumns.add(column);
      }
    }
  }
  const inferred = [...BASE_COLUMNS, ...[...extraColumns].sort()];

  let header: string[];
  if (existingHeader && CORE_COLUMNS.every((column) => existingHeader.includes(column))) {
    header = [...existingHeader, ...inferred.filter((column) => !existingHeader.includes(column))];
  } else {
    if (existingHeader) {
      log.warn("Existing header is missing core columns. Using inferred columns.");
    }
    header = inferred;
  }

  for (const column of [...BASE_COLUMNS].reverse()) {
    if (!header.includes(column)) {
      header.unshift(column);
    }
  }

  return header;
}

/**
 * Format one card field for the CSV file.
 */
function formatField(card: CardRecord, column: string): string {
  switch (column) {
    case "front":
      return card.front;
    case "back":
      return card.back;
    case "next_review_date":
      return card.next_review_date ?? "";
    case "interval_days":
      return String(roundTo(card.interval_days, INTERVAL_PRECISION));
    case "ease_factor":
      return String(roundTo(card.ease_factor, EASE_PRECISION));
    case "lapses":
      return String(card.lapses);
    case "reviews":
      return String(card.reviews);
    default:
      return card.extras.get(column) ?? "";
  }
}

/**
 * Serialize cards to deck file content.
 *
 * @param cards - Every card of the deck, in file order
 * @param existingHeader - Header currently on disk, if any
 */
export function serializeDeck(
  cards: readonly CardRecord[],
  existingHeader: readonly string[] | null = null
): string {
  const header = resolveHeader(cards, existingHeader);
  const rows = cards.map((card) => header.map((column) => formatField(card, column)));
  return serializeCsv([header, ...rows]);
}

// =============================================================================
// Deck File Operations
// =============================================================================

/**
 * Resolve a deck file name inside the decks directory.
 * @throws DeckError if the name would escape the directory
 */
export function getDeckPath(decksDir: string, deckName: string): string {
  if (!deckName || deckName.includes("/") || deckName.includes("\\") || deckName.includes("..")) {
    throw new DeckError(`Invalid deck name: ${deckName}`, "DECK_NOT_FOUND");
  }
  return join(decksDir, deckName);
}

/**
 * Read and parse a deck file.
 * @throws DeckError if the file is missing or not a valid deck
 */
export async function loadDeck(
  path: string,
  deckName: string,
  today: CalendarDate,
  policy: SchedulerPolicy = DEFAULT_POLICY
): Promise<LoadedDeck> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      throw new DeckError(`Deck not found: ${deckName}`, "DECK_NOT_FOUND");
    }
    throw e;
  }

  const result = parseDeck(content, deckName, today, policy);
  if (!result.success) {
    throw new DeckError(`Invalid deck '${deckName}': ${result.error}`, "INVALID_DECK");
  }

  for (const warning of result.warnings) {
    log.warn(warning);
  }
  log.info(`Loaded ${result.cards.length} card(s) from ${deckName}`);

  return {
    name: result.name,
    header: result.header,
    cards: result.cards,
    warnings: result.warnings,
  };
}

/**
 * Read the header row of an existing deck file.
 * Returns null if the file is missing or unreadable.
 */
export async function readDeckHeader(path: string): Promise<string[] | null> {
  try {
    const content = await readFile(path, "utf-8");
    const parsed = parseCsv(content);
    if (!parsed.success || parsed.rows.length === 0) {
      log.warn(`No usable header found in ${path}. Using inferred columns.`);
      return null;
    }
    return parsed.rows[0];
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === "ENOENT") {
      log.debug(`${path} doesn't exist yet. Will create with inferred header.`);
      return null;
    }
    const message = e instanceof Error ? e.message : String(e);
    log.warn(`Could not read existing header from ${path}: ${message}`);
    return null;
  }
}

/**
 * Write a deck file atomically using temp+rename pattern.
 *
 * @param path - Absolute path of the deck file
 * @param cards - Every card of the deck, in file order
 * @throws Error if write fails
 */
export async function saveDeck(path: string, cards: readonly CardRecord[]): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.deck-${randomUUID()}.tmp`);

  try {
    const header = await readDeckHeader(path);
    const content = serializeDeck(cards, header);

    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);

    log.debug(`Wrote ${cards.length} card(s) to ${path}`);
  } catch (e) {
    // Clean up temp file on error
    try {
      await unlink(tempPath);
    } catch {
      // Ignore cleanup errors
    }
    throw e;
  }
}

// =============================================================================
// Deck Discovery
// =============================================================================

/**
 * Content of the deck seeded into a new decks directory.
 */
export function exampleDeckContent(defaultEase: number = DEFAULT_POLICY.defaultEase): string {
  return serializeCsv([
    [...BASE_COLUMNS],
    [
      "Sample Question: What is the capital of France?",
      "Sample Answer: Paris.",
      "",
      "",
      String(defaultEase),
      "0",
      "0",
    ],
    ["Regular Text", "Another plain card.", "", "", String(defaultEase), "0", "0"],
  ]);
}

/**
 * List deck files in a directory, sorted by name.
 *
 * Creates the directory with an example deck if it doesn't exist.
 *
 * @throws DecksDirError if the directory can't be read or created
 */
export async function discoverDecks(decksDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(decksDir, { withFileTypes: true });
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code !== "ENOENT") {
      const message = e instanceof Error ? e.message : String(e);
      throw new DecksDirError(`Error accessing decks directory '${decksDir}': ${message}`);
    }

    try {
      await mkdir(decksDir, { recursive: true });
      await writeFile(join(decksDir, EXAMPLE_DECK_NAME), exampleDeckContent(), "utf-8");
    } catch (createError) {
      const message = createError instanceof Error ? createError.message : String(createError);
      throw new DecksDirError(`Could not create decks directory '${decksDir}': ${message}`);
    }

    log.info(`Created decks directory ${decksDir} with ${EXAMPLE_DECK_NAME}`);
    return [EXAMPLE_DECK_NAME];
  }

  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(DECK_EXTENSION))
    .map((entry) => entry.name)
    .sort();
}
