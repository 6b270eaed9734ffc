/**
 * ascii-art — render text as block letters.
 *
 * Text comes from the positional argument, or from stdin when it is piped.
 */

import { Command } from "commander";
import { UnknownFontError } from "@toolshed/core";
import { DEFAULT_FONT, listFonts, renderText } from "@toolshed/core/ascii-art";
import { VERSION, createBaseProgram, resolveIO, type ProgramOptions } from "./io.js";

export interface AsciiArtProgramOptions extends ProgramOptions {
  readStdin?: () => Promise<string>;
  stdinIsTTY?: boolean;
}

interface AsciiArtCliOptions {
  font: string;
  listFonts?: boolean;
}

export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export function createAsciiArtProgram(options: AsciiArtProgramOptions = {}): Command {
  const io = resolveIO(options.io);
  const read = options.readStdin ?? (() => readStdin());
  const stdinIsTTY = options.stdinIsTTY ?? Boolean(process.stdin.isTTY);

  return createBaseProgram("ascii-art", io, options)
    .description("Generate ASCII art from text")
    .version(VERSION)
    .argument("[text]", "text to render; read from stdin when omitted")
    .option("-f, --font <name>", "font to use", DEFAULT_FONT)
    .option("-l, --list-fonts", "list available fonts")
    .addHelpText(
      "after",
      `
Examples:
  ascii-art "HELLO"
  ascii-art "WORLD" --font standard
  echo "HELLO WORLD" | ascii-art`,
    )
    .action(async (text: string | undefined, opts: AsciiArtCliOptions, command: Command) => {
      if (opts.listFonts) {
        io.stdout(["Available fonts:", ...listFonts().map((name) => `  ${name}`)].join("\n") + "\n");
        return;
      }

      let input = text;
      if (!input) {
        if (stdinIsTTY) {
          command.error("No text provided. Either provide text as argument or pipe it via stdin.");
        }
        input = (await read()).trim();
      }
      if (!input) {
        command.error("Empty text provided.");
      }

      let art: string;
      try {
        art = renderText(input, opts.font);
      } catch (err) {
        if (err instanceof UnknownFontError) {
          command.error(`Error: ${err.message}`);
        }
        throw err;
      }
      io.stdout(`${art}\n`);
    });
}
