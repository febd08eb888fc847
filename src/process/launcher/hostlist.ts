/**
 * Slurm Hostlist Expansion
 *
 * In-process equivalent of `scontrol show hostnames`: turns a compact node
 * list such as "nid[005001-005003,005010],login1" into hostnames, keeping the
 * scheduler's order.
 */

import { LaunchError } from "./errors.js";

const NUMERIC_RE = /^\d+$/;

function malformed(source: string, expr: string, detail: string): LaunchError {
  return new LaunchError(
    "MissingAllocationData",
    `${source} is not a valid hostlist (${detail}): ${expr}`,
  );
}

/** Split on commas outside brackets */
function splitTopLevel(expr: string, source: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let current = "";

  for (const ch of expr) {
    if (ch === "[") {
      if (depth > 0) {
        throw malformed(source, expr, "nested brackets");
      }
      depth++;
    } else if (ch === "]") {
      if (depth === 0) {
        throw malformed(source, expr, "unbalanced brackets");
      }
      depth--;
    } else if (ch === "," && depth === 0) {
      items.push(current);
      current = "";
      continue;
    }
    current += ch;
  }

  if (depth !== 0) {
    throw malformed(source, expr, "unbalanced brackets");
  }
  items.push(current);
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

function expandRangeGroup(body: string, expr: string, source: string): string[] {
  const values: string[] = [];

  for (const part of body.split(",")) {
    const [lo, hi, ...extra] = part.trim().split("-");
    if (lo === undefined || !NUMERIC_RE.test(lo) || extra.length > 0) {
      throw malformed(source, expr, `bad range "${part}"`);
    }
    if (hi === undefined) {
      values.push(lo);
      continue;
    }
    if (!NUMERIC_RE.test(hi)) {
      throw malformed(source, expr, `bad range "${part}"`);
    }

    const start = Number.parseInt(lo, 10);
    const end = Number.parseInt(hi, 10);
    if (end < start) {
      throw malformed(source, expr, `descending range "${part}"`);
    }
    // Zero padding follows the lower bound: [08-10] -> 08 09 10
    for (let n = start; n <= end; n++) {
      values.push(String(n).padStart(lo.length, "0"));
    }
  }

  return values;
}

function expandItem(item: string, expr: string, source: string): string[] {
  let results = [""];
  let rest = item;

  while (rest.length > 0) {
    const open = rest.indexOf("[");
    if (open === -1) {
      const tail = rest;
      results = results.map((prefix) => prefix + tail);
      break;
    }
    const close = rest.indexOf("]", open);
    if (close === -1) {
      throw malformed(source, expr, "unbalanced brackets");
    }

    const literal = rest.slice(0, open);
    const values = expandRangeGroup(rest.slice(open + 1, close), expr, source);
    const next: string[] = [];
    for (const prefix of results) {
      for (const value of values) {
        next.push(prefix + literal + value);
      }
    }
    results = next;
    rest = rest.slice(close + 1);
  }

  return results;
}

/**
 * Expand a Slurm hostlist expression. Bracket groups may hold single numbers
 * and inclusive ranges; several groups in one item expand as a cartesian
 * product, left group outermost.
 */
export function expandHostlist(expr: string, source = "SLURM_JOB_NODELIST"): string[] {
  const hosts: string[] = [];
  for (const item of splitTopLevel(expr.trim(), source)) {
    hosts.push(...expandItem(item, expr, source));
  }
  return hosts;
}
