import { z } from "zod";

/*
Purpose: the table of configuration variables a design configuration may set.
Assumptions: PDK-derived variables are filled in by the config builder, never read from the file.
Usage: findVariable("CLOCK_PERIOD")?.schema.safeParse(value).
*/

export type ConfigVariable = {
  name: string;
  description: string;
  schema: z.ZodType<unknown>;
  required?: boolean;
  default?: unknown;
  /** Entries are paths resolved against the design directory (see file-patterns.ts). */
  paths?: boolean;
  /** Filled in from the PDK; a value in the file or an override is rejected. */
  pdk?: boolean;
};

const SYNTH_STRATEGIES = [
  "AREA 0",
  "AREA 1",
  "AREA 2",
  "AREA 3",
  "DELAY 0",
  "DELAY 1",
  "DELAY 2",
  "DELAY 3",
  "DELAY 4",
] as const;

const StringList = z.array(z.string().min(1));
const PathList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const CONFIG_VARIABLES: readonly ConfigVariable[] = [
  {
    name: "DESIGN_NAME",
    description: "Name of the top-level module of the design.",
    schema: z.string().min(1),
    required: true,
  },
  {
    name: "VERILOG_FILES",
    description: "Verilog sources of the design. Supports `dir::` prefixes and wildcards.",
    schema: PathList,
    required: true,
    paths: true,
  },
  {
    name: "VERILOG_DEFINES",
    description: "Preprocessor defines passed to every tool reading the sources.",
    schema: StringList,
    default: [],
  },
  {
    name: "CLOCK_PORT",
    description: "Name of the design's clock port, or null for combinational designs.",
    schema: z.string().min(1).nullable(),
    default: null,
  },
  {
    name: "CLOCK_PERIOD",
    description: "Clock period in nanoseconds.",
    schema: z.number().positive(),
    default: 10,
  },
  {
    name: "QUIT_ON_LINTER_ERRORS",
    description: "Fail the flow when the linter reports errors.",
    schema: z.boolean(),
    default: true,
  },
  {
    name: "QUIT_ON_LINTER_WARNINGS",
    description: "Fail the flow when the linter reports warnings.",
    schema: z.boolean(),
    default: false,
  },
  {
    name: "LINTER_EXTRA_ARGS",
    description: "Additional arguments passed verbatim to the linter.",
    schema: StringList,
    default: [],
  },
  {
    name: "SYNTH_STRATEGY",
    description: "ABC optimization script used during synthesis.",
    schema: z.enum(SYNTH_STRATEGIES),
    default: "AREA 0",
  },
  {
    name: "SYNTH_NO_FLAT",
    description: "Keep the design hierarchy during synthesis.",
    schema: z.boolean(),
    default: false,
  },
  {
    name: "STD_CELL_LIBRARY",
    description: "Standard cell library; --scl takes precedence.",
    schema: z.string().min(1),
  },
  { name: "PDK", description: "Process design kit.", schema: z.string().min(1), pdk: true },
  { name: "PDK_ROOT", description: "Directory holding PDKs.", schema: z.string().min(1), pdk: true },
  {
    name: "LIB_SYNTH",
    description: "Liberty files of the typical corner used for synthesis.",
    schema: StringList,
    pdk: true,
  },
];

const VARIABLES_BY_NAME = new Map(CONFIG_VARIABLES.map((variable) => [variable.name, variable]));

export function findVariable(name: string): ConfigVariable | undefined {
  return VARIABLES_BY_NAME.get(name);
}
