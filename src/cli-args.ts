import yargs from "yargs";

interface ParsedCommand {
  name: string;
  args: string[];
}

interface ParsedArgs {
  command: ParsedCommand;
  helpRequested: boolean;
  json: boolean;
}

export const parseArgs = ({ argv }: { argv: string[] }): ParsedArgs => {
  const parser = yargs(argv)
    .parserConfiguration({ "unknown-options-as-args": true })
    .option("json", { type: "boolean", default: false })
    .option("help", { type: "boolean", alias: "h", default: false })
    .help(false)
    .version(false);
  const parsed = parser.parseSync();
  const parsedArgs = parsed._.map((value) => String(value));
  const [name, ...args] = parsedArgs;
  return {
    command: {
      name: name ?? "",
      args,
    },
    helpRequested: Boolean(parsed.help),
    json: Boolean(parsed.json),
  };
};
