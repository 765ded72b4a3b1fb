import { Command } from "commander";
import { createNameRegistry, loadCSharpKeywords, naturalnessScore } from "../../lib/naming/index.js";
import type { NamesCommandOptions } from "../config/types.js";
import { handleCommandError, printResult } from "../output.js";
import { parseNamingStyle } from "./generate.js";

/**
 * Create names command: shows the identifiers a group of raw names would receive
 * if they were allocated together, in the order given
 */
export function createNamesCommand(): Command {
  return new Command("names")
    .description("Canonicalize raw names and resolve collisions between them")
    .argument("<raw...>", "Raw schema or property names")
    .option("--naming-style <style>", "Identifier casing: pascal or camel", parseNamingStyle)
    .action((raws: string[], opts: NamesCommandOptions) => {
      try {
        const registry = createNameRegistry({
          style: opts.namingStyle ?? "pascal",
          reservedWords: loadCSharpKeywords(),
        });
        const names = registry.allocate(raws);

        printResult({
          status: "success",
          names: raws.map((raw, index) => {
            const canonical = registry.canonicalize(raw);
            return {
              raw,
              canonical,
              name: names[index],
              score: naturalnessScore(raw, canonical),
            };
          }),
        });
      } catch (error) {
        handleCommandError(error, "naming");
      }
    });
}
