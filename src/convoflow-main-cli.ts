/*
**  ConvoFlow - Real-Time Conversational Frame Pipeline
**  Copyright (c) 2024-2025 Dr. Ralf S. Engelschall <rse@engelschall.com>
**  Licensed under GPL 3.0 <https://spdx.org/licenses/GPL-3.0-only>
*/

/*  external dependencies  */
import CLIio                  from "cli-io"
import yargs                  from "yargs"
import { hideBin }            from "yargs/helpers"
import jsYAML                 from "js-yaml"
import dotenvx                from "@dotenvx/dotenvx"
import chalk                  from "chalk"

/*  internal dependencies  */
import { type SessionConfig, selectSessionConfig } from "./convoflow-main-config"
import * as util              from "./convoflow-util"
import pkg                    from "../package.json"

/*  command-line options  */
export interface CLIOptions {
    V: boolean
    v: string
    c: string
    i: string
    r: boolean
    S: number
    e: string
    _: (string | number)[]
}

export class CLIContext {
    public cli:    CLIio         | null = null
    public args:   CLIOptions    | null = null
    public config: SessionConfig | null = null
    public debug                        = false

    /*  type guard for initialization  */
    isInitialized (): this is CLIContext & { cli: CLIio; args: CLIOptions; config: SessionConfig } {
        return this.cli !== null && this.args !== null && this.config !== null
    }

    /*  initialization of CLI  */
    async init (): Promise<void> {
        /*  parse command-line arguments  */
        const coerce = (arg: string) => Array.isArray(arg) ? arg[arg.length - 1] : arg
        this.args = await yargs()
            /* eslint @stylistic/indent: off */
            .usage(
                "Usage: $0 " +
                "[-h|--help] " +
                "[-V|--version] " +
                "[-v|--log-level <level>] " +
                "[-e|--env <env-file>] " +
                "[-r|--realtime] " +
                "[-S|--silence <seconds>] " +
                "-c|--config <id>@<yaml-config-file> " +
                "-i|--input <wav-file>"
            )
            .version(false)
            .option("V", {
                alias:    "version",
                type:     "boolean",
                array:    false,
                coerce,
                default:  false,
                describe: "show program version information"
            })
            .option("v", {
                alias:    "log-level",
                type:     "string",
                array:    false,
                coerce,
                nargs:    1,
                default:  "warning",
                describe: "level for verbose logging ('none', 'error', 'warning', 'info', 'debug')"
            })
            .option("e", {
                alias:    "env",
                type:     "string",
                array:    false,
                coerce,
                nargs:    1,
                default:  ".env",
                describe: "environment file with API keys"
            })
            .option("r", {
                alias:    "realtime",
                type:     "boolean",
                array:    false,
                coerce,
                default:  true,
                describe: "feed the input audio in real-time pace"
            })
            .option("S", {
                alias:    "silence",
                type:     "number",
                array:    false,
                coerce,
                nargs:    1,
                default:  4,
                describe: "seconds of silence appended to the input audio"
            })
            .option("c", {
                alias:    "config",
                type:     "string",
                array:    false,
                coerce,
                nargs:    1,
                default:  "",
                describe: "session configuration reference into YAML file (in format <id>@<file>)"
            })
            .option("i", {
                alias:    "input",
                type:     "string",
                array:    false,
                coerce,
                nargs:    1,
                default:  "",
                describe: "input audio file (WAV, PCM/S16LE, mono)"
            })
            .help("h", "show usage help")
            .alias("h", "help")
            .showHelpOnFail(true)
            .strict()
            .demand(0)
            .parse(hideBin(process.argv)) as CLIOptions

        /*  short-circuit version request  */
        if (this.args.V) {
            process.stderr.write(`ConvoFlow ${pkg.version}\n`)
            process.stderr.write(`${pkg.description}\n`)
            process.stderr.write(`Licensed under ${pkg.license} <http://spdx.org/licenses/${pkg.license}.html>\n`)
            process.exit(0)
        }

        /*  establish CLI environment  */
        this.cli = new CLIio({
            encoding:  "utf8",
            logLevel:  this.args.v,
            logTime:   true,
            logPrefix: pkg.name
        })
        if (this.args.v.match(/^(?:info|debug)$/))
            this.debug = true

        /*  provide startup information  */
        this.cli.log("info", `starting ConvoFlow ${pkg.version}`)

        /*  load .env files  */
        const result = dotenvx.config({
            path:     this.args.e,
            encoding: "utf8",
            ignore:   [ "MISSING_ENV_FILE" ],
            quiet:    true
        })
        if (result?.parsed !== undefined)
            for (const key of Object.keys(result.parsed))
                this.cli.log("info", `loaded environment variable "${key}" from "${this.args.e}"`)

        /*  sanity check arguments  */
        if (this.args.c === "")
            throw new Error("need a session configuration (use option -c)")
        if (this.args.i === "")
            throw new Error("need an input audio file (use option -i)")
        if (this.args.S < 0)
            throw new Error("trailing silence must not be negative")

        /*  read configuration  */
        const m = this.args.c.match(/^(.+?)@(.+)$/)
        if (m === null)
            throw new Error("invalid configuration file specification (expected \"<id>@<yaml-config-file>\")")
        const [ , id, file ] = m
        const yaml: string = await this.cli.input(file, { encoding: "utf8" })
        const obj: unknown = util.run("parsing YAML configuration", () => jsYAML.load(yaml))
        this.config = selectSessionConfig(obj, id, file)
    }

    /*  utility function for handling a top-level error  */
    handleTopLevelError (err: Error): never {
        if (this.cli !== null) {
            if (this.debug)
                this.cli.log("error", `${err.message}\n${err.stack}`)
            else
                this.cli.log("error", `${err.message}`)
        }
        else {
            if (this.debug)
                process.stderr.write(`${pkg.name}: ${chalk.red("ERROR")}: ${err.message}\n${err.stack}\n`)
            else
                process.stderr.write(`${pkg.name}: ${chalk.red("ERROR")}: ${err.message}\n`)
        }
        process.exit(1)
    }
}
