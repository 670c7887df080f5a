#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import { ConfigError, createService, loadConfig, loadEnvFiles } from "../lib/config";
import { errorMessage, isAbortError } from "../lib/llm/errors";
import { setLogLevel } from "../lib/logger";
import type { LLMService } from "../lib/llm/service";
import type { OrchestratedResponse, SendOptions } from "../lib/llm/types";
import { builtinTools } from "../lib/tools/builtin";
import { ToolRegistry } from "../lib/tools/registry";
import {
  printHistory,
  printProviders,
  printRefreshSummary,
  printResponseFooter,
  printTools,
} from "./display";

loadEnvFiles();

const HELP = [
  "  /tools               toggle tool mode",
  "  /providers           list providers",
  "  /use <provider>      switch the active provider",
  "  /refresh [provider]  refresh model catalogs",
  "  /image <file> <msg>  send an image with a message",
  "  /history             show this conversation",
  "  /reset               start a new conversation",
  "  quit                 exit",
];

interface Session {
  service: LLMService;
  tools: ToolRegistry;
  conversationId: string;
  toolMode: boolean;
  inFlight: AbortController | null;
}

async function handleCommand(session: Session, input: string): Promise<void> {
  const [command, ...rest] = input.split(/\s+/);
  const arg = rest.join(" ");

  switch (command) {
    case "/help":
      HELP.forEach((line) => console.log(line));
      return;
    case "/tools":
      session.toolMode = !session.toolMode;
      console.log(`  Tool mode ${session.toolMode ? "on" : "off"}`);
      if (session.toolMode) printTools(session.tools.definitions());
      return;
    case "/providers":
      printProviders(session.service.listProviders());
      return;
    case "/use": {
      const ok = await session.service.setActiveProvider(arg);
      console.log(ok ? `  Active provider: ${arg}` : `  Unknown provider: ${arg}`);
      return;
    }
    case "/refresh":
      if (arg) {
        const ok = await session.service.refreshModelsForProvider(arg);
        console.log(ok ? `  Refreshed models for ${arg}` : `  Could not refresh models for ${arg}`);
      } else {
        printRefreshSummary(await session.service.refreshModels());
      }
      return;
    case "/history":
      printHistory(await session.service.getConversationHistory(session.conversationId));
      return;
    case "/reset":
      await session.service.deleteConversation(session.conversationId);
      session.conversationId = await session.service.createConversation();
      console.log("  Started a new conversation.");
      return;
    case "/image": {
      const [file, ...words] = rest;
      if (!file || words.length === 0) {
        console.log("  Usage: /image <file> <message>");
        return;
      }
      const image = new Uint8Array(fs.readFileSync(path.resolve(process.cwd(), file)));
      await send(session, (options) => session.service.sendMessageWithImage(words.join(" "), image, options), false);
      return;
    }
    default:
      console.log(`  Unknown command: ${command} (try /help)`);
  }
}

async function send(
  session: Session,
  call: (options: SendOptions) => Promise<OrchestratedResponse>,
  streamed: boolean
): Promise<void> {
  const controller = new AbortController();
  session.inFlight = controller;
  try {
    const response = await call({ conversationId: session.conversationId, signal: controller.signal });
    if (!streamed) process.stdout.write(response.content);
    process.stdout.write("\n");
    // Unknown ids are replaced with a fresh conversation
    session.conversationId = response.conversationId;
    printResponseFooter(response);
  } catch (err) {
    if (isAbortError(err, controller.signal)) {
      console.log("\n  (cancelled)");
    } else {
      console.error(`\n  Error: ${errorMessage(err)}`);
    }
  } finally {
    session.inFlight = null;
  }
}

function chat(session: Session, message: string): Promise<void> {
  const onChunk = (chunk: string): void => {
    process.stdout.write(chunk);
  };
  process.stdout.write("\n");
  return send(
    session,
    (options) =>
      session.toolMode
        ? session.service.sendMessageWithToolsStreaming(message, session.tools.definitions(), onChunk, options)
        : session.service.sendMessagesStreaming([{ role: "user", content: message }], onChunk, options),
    true
  );
}

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const tools = new ToolRegistry(builtinTools());
    const service = createService(config, { toolExecutor: tools });
    await service.start();

    const session: Session = {
      service,
      tools,
      conversationId: await service.createConversation(),
      toolMode: false,
      inFlight: null,
    };

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    rl.on("SIGINT", () => {
      if (session.inFlight) {
        session.inFlight.abort();
        return;
      }
      rl.close();
    });
    rl.on("close", () => {
      service.stop();
      console.log("\nSession ended.");
    });

    console.log("+==========================================+");
    console.log("|   LLM Switchboard -- Interactive Chat     |");
    console.log("|   Type /help for commands, 'quit' to exit |");
    console.log("+==========================================+");
    printProviders(service.listProviders());
    console.log();

    const askForMessage = (): void => {
      rl.question(session.toolMode ? "[tools] > " : "> ", async (input) => {
        const trimmed = input.trim();
        if (trimmed.toLowerCase() === "quit" || trimmed.toLowerCase() === "exit") {
          rl.close();
          return;
        }

        if (trimmed.startsWith("/")) {
          await handleCommand(session, trimmed).catch((err: unknown) => {
            console.error(`  Error: ${errorMessage(err)}`);
          });
        } else if (trimmed) {
          await chat(session, trimmed);
        }
        console.log();
        askForMessage();
      });
    };

    askForMessage();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
