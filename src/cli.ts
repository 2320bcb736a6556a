#!/usr/bin/env node
/**
 * CLI for OpenAI-compatible inference endpoints (Amazon Bedrock Mantle).
 * Usage: mantle-chat <command> [options]
 * Commands: list-models | chat | info
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadClientConfig, loadEnvFile, type ClientConfig } from "./config/ClientConfig.js";
import { runChatLoop, type ChatMode } from "./chat/ChatLoop.js";
import { CompletionsChat } from "./chat/CompletionsChat.js";
import { ResponsesChat } from "./chat/ResponsesChat.js";
import { StreamTerminal } from "./chat/Terminal.js";
import { CliError, ConfigError, UsageError, describeError } from "./core/errors.js";
import { INFO_TEXT } from "./info/InfoText.js";
import { createOpenAIGateway } from "./llm/OpenAIInferenceGateway.js";
import type { InferenceGateway, ModelRecord } from "./llm/types.js";
import { createLogger, type Logger } from "./observability/Logger.js";

const BIN = "mantle-chat";
const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant.";
const RULE = "-".repeat(60);

type CommandName = "list-models" | "chat" | "info";

interface ChatArgs {
  model: string;
  stream: boolean;
  completions: boolean;
  background: boolean;
  system: string;
}

type CliArgs =
  | { command: "help"; topic?: CommandName }
  | { command: "list-models" }
  | { command: "info" }
  | { command: "chat"; chat: ChatArgs };

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
  createGateway(config: ClientConfig): InferenceGateway;
  logger: Logger;
  /** Wait between background polls; one second when unset. */
  pollIntervalMs?: number;
}

function isCommandName(value: string): value is CommandName {
  return value === "list-models" || value === "chat" || value === "info";
}

function parseArgv(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const commandIndex = args.findIndex((arg) => !arg.startsWith("-"));

  let help = false;
  for (const arg of commandIndex === -1 ? args : args.slice(0, commandIndex)) {
    if (arg !== "--help" && arg !== "-h") throw new UsageError(`No such option: ${arg}`);
    help = true;
  }
  if (help || commandIndex === -1) return { command: "help" };

  const name = args[commandIndex] ?? "";
  if (name === "help") return { command: "help" };
  if (!isCommandName(name)) throw new UsageError(`No such command '${name}'.`);

  const rest = args.slice(commandIndex + 1);
  if (name === "chat") return parseChatArgs(rest);
  if (rest.includes("--help") || rest.includes("-h")) return { command: "help", topic: name };

  const [extra] = rest;
  if (extra !== undefined) {
    throw new UsageError(
      extra.startsWith("-") ? `No such option: ${extra}` : `Got unexpected extra argument (${extra})`,
      name,
    );
  }
  return { command: name };
}

/** Parse chat options; `--help` only counts where an option name is expected. */
function parseChatArgs(args: string[]): CliArgs {
  let model: string | undefined;
  let system = DEFAULT_SYSTEM_PROMPT;
  let stream = true;
  let completions = false;
  let background = false;

  const takeValue = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined) throw new UsageError(`Option '${flag}' requires an argument.`, "chat");
    return value;
  };
  const noValue = (flag: string, inline: string | undefined): void => {
    if (inline !== undefined) throw new UsageError(`Option '${flag}' does not take a value.`, "chat");
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    switch (flag) {
      case "--model":
      case "-m":
        model = inline ?? takeValue(flag, ++i);
        break;
      case "--system":
      case "-s":
        system = inline ?? takeValue(flag, ++i);
        break;
      case "--help":
      case "-h":
        noValue(flag, inline);
        return { command: "help", topic: "chat" };
      case "--no-stream":
        noValue(flag, inline);
        stream = false;
        break;
      case "--completions":
        noValue(flag, inline);
        completions = true;
        break;
      case "--background":
        noValue(flag, inline);
        background = true;
        break;
      default:
        throw new UsageError(
          arg.startsWith("-") ? `No such option: ${flag}` : `Got unexpected extra argument (${arg})`,
          "chat",
        );
    }
  }

  if (model === undefined) throw new UsageError("Missing option '--model' / '-m'.", "chat");
  return { command: "chat", chat: { model, stream, completions, background, system } };
}

function printHelp(topic?: CommandName): void {
  switch (topic) {
    case "chat":
      process.stdout.write(`
Usage: ${BIN} chat [OPTIONS]

  Start an interactive chat session.

  By default, uses the Responses API with streaming enabled.

  API Comparison:
  - Responses API (default): Stateful, supports background processing,
    maintains conversation context automatically via previous_response_id
  - Chat Completions API (--completions): Stateless, simpler interface,
    requires manual conversation history management

  Commands during chat:
    /quit or /q  - Exit the chat
    /exit or /e  - Exit the chat
    /clear       - Clear conversation history
    /status      - Show current API mode and settings

Options:
  -m, --model TEXT   Model ID or inference profile to use  [required]
  --no-stream        Disable streaming (streaming is enabled by default)
  --completions      Use Chat Completions API instead of Responses API
  --background       Enable background processing (Responses API only).
                     Demonstrates async inference.
  -s, --system TEXT  System prompt for the conversation
                     (default: "${DEFAULT_SYSTEM_PROMPT}")
  -h, --help         Show this message and exit.
`);
      return;
    case "list-models":
      process.stdout.write(`
Usage: ${BIN} list-models [OPTIONS]

  List available models for Bedrock Mantle.

  Models listed here are available for both the Responses API and Chat
  Completions API. The same set of models is supported by both APIs.

Options:
  -h, --help  Show this message and exit.
`);
      return;
    case "info":
      process.stdout.write(`
Usage: ${BIN} info [OPTIONS]

  Show information about API differences and limitations.

  Displays a comparison between the Responses API and Chat Completions API,
  including model availability and feature support.

Options:
  -h, --help  Show this message and exit.
`);
      return;
    default:
      process.stdout.write(`
Usage: ${BIN} <command> [options]

  CLI for Amazon Bedrock OpenAI-compatible APIs (Mantle).

  This CLI provides access to:
  - Models API: List available models
  - Responses API: Stateful conversations with background processing support
  - Chat Completions API: Stateless chat completions

  Configuration is done via environment variables (or .env file):
  - OPENAI_API_KEY: Your Bedrock API key (required)
  - OPENAI_BASE_URL: Mantle endpoint URL (required)

Commands:
  list-models  List available models for Bedrock Mantle.
  chat         Start an interactive chat session.
  info         Show information about API differences and limitations.

Options:
  --help, -h   Show this help.

Examples:
  ${BIN} list-models
  ${BIN} chat --model openai.gpt-oss-20b
  ${BIN} chat -m openai.gpt-oss-120b --completions --no-stream
  ${BIN} chat -m openai.gpt-oss-20b --background
`);
  }
}

function printUsageError(err: UsageError): void {
  const scope = err.command ? `${BIN} ${err.command}` : BIN;
  const usage = err.command ? `${scope} [OPTIONS]` : `${BIN} <command> [options]`;
  process.stderr.write(`Usage: ${usage}\nTry '${scope} --help' for help.\n\nError: ${err.message}\n`);
}

async function cmdListModels(deps: CliDependencies): Promise<number> {
  const config = loadClientConfig(deps.env);
  const gateway = deps.createGateway(config);

  process.stdout.write(`Endpoint: ${config.baseUrl}\n\n`);

  let models: ModelRecord[];
  try {
    models = await gateway.listModels();
  } catch (err) {
    throw new CliError(`Failed to list models: ${describeError(err)}`);
  }

  process.stdout.write(`Available Models:\n${RULE}\n`);
  for (const model of models) {
    process.stdout.write(`  ID: ${model.id}\n`);
    if (model.created !== undefined) process.stdout.write(`      Created: ${model.created}\n`);
    if (model.ownedBy !== undefined) process.stdout.write(`      Owner: ${model.ownedBy}\n`);
    process.stdout.write("\n");
  }
  return 0;
}

function printChatBanner(chat: ChatArgs): void {
  const lines = [
    "Starting chat session",
    `  Model: ${chat.model}`,
    `  API: ${chat.completions ? "Chat Completions" : "Responses"} API`,
    `  Streaming: ${chat.stream ? "enabled" : "disabled"}`,
  ];
  if (!chat.completions) lines.push(`  Background: ${chat.background ? "enabled" : "disabled"}`);
  lines.push("", "Type /quit or /q to exit, /clear to reset conversation", RULE, "");
  process.stdout.write(lines.join("\n") + "\n");
}

async function cmdChat(chat: ChatArgs, deps: CliDependencies): Promise<number> {
  if (chat.background && chat.completions) {
    throw new ConfigError(
      "Background processing is only available with the Responses API.\n" +
        "Remove --completions to use background mode.",
    );
  }

  if (chat.background && chat.stream) {
    process.stdout.write(
      "Note: Background mode with streaming - events will stream as processing completes.\n\n",
    );
  }
  printChatBanner(chat);

  const config = loadClientConfig(deps.env);
  const gateway = deps.createGateway(config);
  const terminal = new StreamTerminal({ input: deps.stdin });
  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort();
    terminal.close();
  };
  process.once("SIGINT", onInterrupt);

  const mode: ChatMode = chat.completions
    ? new CompletionsChat({
        gateway,
        terminal,
        model: chat.model,
        systemPrompt: chat.system,
        stream: chat.stream,
      })
    : new ResponsesChat({
        gateway,
        terminal,
        model: chat.model,
        systemPrompt: chat.system,
        stream: chat.stream,
        background: chat.background,
        pollIntervalMs: deps.pollIntervalMs,
      });

  try {
    const outcome = await runChatLoop(mode, { terminal, signal: controller.signal, logger: deps.logger });
    deps.logger.debug("chat session finished", { outcome });
    return 0;
  } catch (err) {
    throw new CliError(`Chat error: ${describeError(err)}`);
  } finally {
    process.off("SIGINT", onInterrupt);
    terminal.close();
  }
}

function defaultDependencies(overrides: Partial<CliDependencies>): CliDependencies {
  const logger = overrides.logger ?? createLogger();
  return {
    env: overrides.env ?? process.env,
    stdin: overrides.stdin ?? process.stdin,
    createGateway: overrides.createGateway ?? ((config) => createOpenAIGateway(config, { logger })),
    logger,
    pollIntervalMs: overrides.pollIntervalMs,
  };
}

async function main(argv: string[] = process.argv, overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps = defaultDependencies(overrides);

  try {
    const args = parseArgv(argv);
    switch (args.command) {
      case "help":
        printHelp(args.topic);
        return 0;
      case "info":
        process.stdout.write(INFO_TEXT);
        return 0;
      case "list-models":
        return await cmdListModels(deps);
      case "chat":
        return await cmdChat(args.chat, deps);
    }
  } catch (err) {
    deps.logger.debug("command failed", { error: describeError(err) });
    if (err instanceof UsageError) {
      printUsageError(err);
      return err.exitCode;
    }
    process.stderr.write(`Error: ${describeError(err)}\n`);
    return err instanceof CliError ? err.exitCode : 1;
  }
}

/** Run CLI with the given argv (same shape as process.argv). Exported for tests. */
export async function run(argv: string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  return main(argv, deps);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  loadEnvFile();
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      process.stderr.write(`${describeError(err)}\n`);
      process.exit(1);
    });
}
