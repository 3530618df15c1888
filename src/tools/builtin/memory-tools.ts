import { z } from "zod";
import type { MemoryStore } from "../../memory/store.js";
import { LONG_TERM_CATEGORIES, PROFILE_DOCUMENTS } from "../../memory/types.js";
import { errorMessage } from "../../utils/errors.js";
import { defineTool, fail, ok, type ToolDefinition } from "../types.js";

const category = z
  .enum(LONG_TERM_CATEGORIES)
  .describe("Section of long-term memory: Preferences, Decisions, Projects or Notes");

export function memoryTools(memory: MemoryStore): ToolDefinition[] {
  const remember = defineTool({
    name: "remember",
    description: "Save an important fact to long-term memory so it is available in future conversations.",
    parameters: z.object({
      category,
      text: z.string().min(1).describe("The fact to remember"),
    }),
    async execute(args, ctx) {
      try {
        await memory.write("long-term", {
          target: "curated",
          category: args.category,
          text: args.text,
          sourceChannel: ctx.channelId,
        });
        return ok(`Saved to ${args.category}.`);
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  const forget = defineTool({
    name: "forget",
    description: "Remove long-term memory entries in a section whose text contains the given phrase.",
    parameters: z.object({
      category,
      text: z.string().min(3).describe("Phrase identifying the entries to remove"),
    }),
    async execute(args) {
      try {
        const removed = await memory.longTerm.remove(args.category, args.text);
        return ok({ removed });
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  const logDaily = defineTool({
    name: "log_daily",
    description: "Append a short note to today's activity log.",
    parameters: z.object({
      text: z.string().min(1).describe("What happened"),
    }),
    async execute(args) {
      try {
        await memory.write("long-term", { target: "daily", text: args.text });
        return ok("Logged.");
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  const note = defineTool({
    name: "note",
    idempotent: true,
    description: "Keep a scratch note for the rest of this conversation. Notes with the same key are replaced.",
    parameters: z.object({
      key: z.string().min(1).max(64),
      text: z.string().min(1),
    }),
    async execute(args, ctx) {
      await memory.write("working", { conversationId: ctx.conversationId, key: args.key, text: args.text });
      return ok(`Noted ${args.key}.`);
    },
  });

  const updateProfile = defineTool({
    name: "update_profile",
    description:
      "Update a profile document: user (facts about the user), soul (how the assistant should behave) or tools (environment notes).",
    parameters: z.object({
      document: z.enum(PROFILE_DOCUMENTS),
      section: z.string().min(1).describe("Section heading, for example Preferences"),
      text: z.string().min(1),
      mode: z.enum(["append", "replace"]).default("append"),
    }),
    async execute(args, ctx) {
      if (args.document === "user" && ctx.conversationKind !== "direct") {
        return fail("The user profile can only be changed in a private conversation.");
      }
      try {
        await memory.write("profile", {
          document: args.document,
          section: args.section,
          text: args.text,
          mode: args.mode,
        });
        return ok(`Updated ${args.document} / ${args.section}.`);
      } catch (err) {
        return fail(errorMessage(err));
      }
    },
  });

  return [remember, forget, logDaily, note, updateProfile];
}
