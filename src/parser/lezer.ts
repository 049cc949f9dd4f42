/**
 * The Lezer parser, generated from `concat.grammar` when this module loads.
 */

import * as fs from "fs";
import { buildParser } from "@lezer/generator";
import type { LRParser } from "@lezer/lr";
import { highlighting } from "./highlight";

const grammar = fs.readFileSync(new URL("./concat.grammar", import.meta.url), "utf-8");

/** Error-tolerant parser, used for highlighting partial input. */
export const parser: LRParser = buildParser(grammar).configure({ props: [highlighting] });

/** Parser that throws a `SyntaxError` on the first error instead of recovering. */
export const strictParser: LRParser = parser.configure({ strict: true });

export const assertionParser: LRParser = strictParser.configure({ top: "Assertion" });
