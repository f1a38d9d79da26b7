import { knifecenterParser } from "./knifecenter/KnifecenterParser";
import type { ParserDefinition } from "./parser.registry";

export const builtInParsers: readonly ParserDefinition[] = [knifecenterParser];
