import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import packageJson from "../package.json" with { type: "json" };
import type { TimerApp } from "./app.js";
import { describeError } from "./errors.js";
import { AVAILABLE_SOUNDS } from "./state/settingsStore.js";
import { TimerToolset } from "./tools/timerTool.js";
import type { TimerUpdateResult } from "./types.js";
import { buildTimerStructuredContent } from "./ui/builders.js";

export interface TimerServerContext {
  server: McpServer;
  toolset: TimerToolset;
}

const durationShape = z
  .union([
    z.number().int().positive(),
    z.string().min(1).describe('Examples: "5 minutes", "90s", "1:30" or "1h 15m".'),
    z.object({
      minutes: z.number().int().min(0).optional(),
      seconds: z.number().int().min(0).max(59).optional()
    })
  ])
  .optional();

const timerInputSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("start"),
    duration: durationShape,
    preset: z.string().optional(),
    label: z.string().optional()
  }),
  z.object({ action: z.literal("pause") }),
  z.object({ action: z.literal("resume") }),
  z.object({ action: z.literal("toggle") }),
  z.object({ action: z.literal("stop") }),
  z.object({ action: z.literal("status") })
]);

const presetFields = {
  name: z.string(),
  minutes: z.number().int(),
  seconds: z.number().int().default(0)
};

const presetsInputSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("list") }),
  z.object({ action: z.literal("add"), ...presetFields }),
  z.object({ action: z.literal("update"), preset: z.string(), ...presetFields }),
  z.object({ action: z.literal("remove"), preset: z.string() })
]);

const settingsInputSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("get") }),
  z.object({ action: z.literal("selectSound"), sound: z.string() }),
  z.object({
    action: z.literal("setHotkey"),
    hotkey: z.enum(["start", "pauseResume", "stop"]),
    keyCode: z.number().int().nullable(),
    modifiers: z.number().int().default(0)
  })
]);

export function createTimerServer(app: TimerApp): TimerServerContext {
  const toolset = new TimerToolset(app.engine, app.settings, app.hotkeys);
  const logger = app.logger.child({ component: "server" });
  const server = new McpServer(
    {
      name: "tickbar",
      version: packageJson.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const timerResult = (result: TimerUpdateResult) => buildResult(result.message, {
    ...buildTimerStructuredContent({
      snapshot: result.snapshot,
      floatingPanel: app.floatingPanel.view(),
      popover: app.popover.view()
    })
  });

  server.registerTool(
    "timer",
    {
      title: "Timer",
      description: "Start, pause, resume, toggle, stop or inspect the countdown timer.",
      inputSchema: {
        action: z.enum(["start", "pause", "resume", "toggle", "stop", "status"]),
        duration: durationShape,
        preset: z.string().optional().describe("Name of a saved preset, used when no duration is given."),
        label: z.string().optional().describe("What the timer is for.")
      },
      annotations: {
        readOnlyHint: false
      }
    },
    async input =>
      guard(logger, () => {
        const parsed = timerInputSchema.parse(input);
        switch (parsed.action) {
          case "start":
            return timerResult(
              toolset.startTimer({ duration: parsed.duration, preset: parsed.preset, label: parsed.label })
            );
          case "pause":
            return timerResult(toolset.pauseTimer());
          case "resume":
            return timerResult(toolset.resumeTimer());
          case "toggle":
            return timerResult(toolset.togglePauseResume());
          case "stop":
            return timerResult(toolset.stopTimer());
          case "status":
            return timerResult(toolset.status());
        }
      })
  );

  server.registerTool(
    "presets",
    {
      title: "Timer presets",
      description: "List, add, update or remove saved timer durations.",
      inputSchema: {
        action: z.enum(["list", "add", "update", "remove"]),
        preset: z.string().optional().describe("Id or name of the preset to update or remove."),
        name: z.string().optional(),
        minutes: z.number().int().optional(),
        seconds: z.number().int().optional()
      }
    },
    async input =>
      guard(logger, async () => {
        const parsed = presetsInputSchema.parse(input);
        switch (parsed.action) {
          case "list":
            return buildResult("Saved presets.", { presets: toolset.listPresets() });
          case "add": {
            const preset = await toolset.addPreset(parsed);
            return buildResult(`Added preset ${preset.name} (${preset.displayName}).`, { preset });
          }
          case "update": {
            const { preset: target, ...fields } = parsed;
            const preset = await toolset.updatePreset(target, fields);
            return buildResult(`Updated preset ${preset.name} (${preset.displayName}).`, { preset });
          }
          case "remove": {
            const preset = await toolset.removePreset(parsed.preset);
            return buildResult(`Removed preset ${preset.name}.`, { preset });
          }
        }
      })
  );

  server.registerTool(
    "settings",
    {
      title: "Timer settings",
      description: `Read settings, choose the alarm sound (${AVAILABLE_SOUNDS.join(", ")}) or bind a hotkey.`,
      inputSchema: {
        action: z.enum(["get", "selectSound", "setHotkey"]),
        sound: z.string().optional(),
        hotkey: z.enum(["start", "pauseResume", "stop"]).optional(),
        keyCode: z.number().int().nullable().optional().describe("Virtual key code, or null to clear the binding."),
        modifiers: z.number().int().optional().describe("Bit mask: 256 ⌘, 512 ⇧, 2048 ⌥, 4096 ⌃.")
      }
    },
    async input =>
      guard(logger, async () => {
        const parsed = settingsInputSchema.parse(input);
        switch (parsed.action) {
          case "get":
            return buildResult("Current settings.", { ...toolset.getSettings() });
          case "selectSound":
            return buildResult(`Alarm sound set to ${parsed.sound}.`, { ...(await toolset.selectSound(parsed.sound)) });
          case "setHotkey": {
            const summary = await toolset.setHotkey({
              action: parsed.hotkey,
              keyCode: parsed.keyCode,
              modifiers: parsed.modifiers
            });
            const shown = summary.hotkeys[parsed.hotkey];
            return buildResult(shown ? `Bound ${parsed.hotkey} to ${shown}.` : `Cleared the ${parsed.hotkey} hotkey.`, {
              ...summary
            });
          }
        }
      })
  );

  server.registerTool(
    "hotkey",
    {
      title: "Hotkey signal",
      description: "Fire one of the global hotkey signals: start from the popover draft, pause/resume, or stop.",
      inputSchema: {
        signal: z.enum(["start", "pauseResume", "stop"])
      }
    },
    async ({ signal }) => guard(logger, () => timerResult(toolset.triggerHotkey(signal)))
  );

  return {
    server,
    toolset
  };
}

function buildResult(message: string, structuredContent: Record<string, unknown>) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent
  };
}

type ToolResult = ReturnType<typeof buildResult> | ReturnType<typeof errorResult>;

function errorResult(message: string) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    isError: true
  };
}

async function guard(
  logger: TimerApp["logger"],
  handler: () => ToolResult | Promise<ToolResult>
): Promise<ToolResult> {
  try {
    return await handler();
  } catch (error) {
    if (error instanceof z.ZodError) {
      return errorResult(error.issues.map(issue => issue.message).join(" "));
    }
    logger.warn({ err: error }, "Timer tool call failed");
    return errorResult(describeError(error));
  }
}
