/**
 * Giveaway Bot — src/lib/cmdWrap.ts
 * WHAT: Helpers to standardize interaction lifecycle: tracing, step logging, safe replies.
 * WHY: Every command and button shares one failure boundary: log, report, ephemeral reply.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Response window: https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { addBreadcrumb, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import { classifyError, errorContext, userFriendlyMessage } from "./errors.js";

/**
 * A "phase" is a label for where we are in a command ("validate", "create", "reply").
 * "It failed in phase 'publish'" beats "it failed somewhere in start-giveaway".
 */
type Phase = string;

export type InstrumentedInteraction = ChatInputCommandInteraction | ButtonInteraction;

export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): "slash" | "button" {
  return "commandName" in interaction ? "slash" : "button";
}

/**
 * Wraps a handler with trace id, step logging, Sentry tagging and an ephemeral
 * error reply. Never throws to the caller.
 */
export function wrapCommand<I extends InstrumentedInteraction>(name: string, fn: CommandExecutor<I>) {
  return async (interaction: I): Promise<void> => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const kind = store.kind ?? inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
        addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
      },
      currentPhase: () => phase,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
        kind,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );
    setTag("cmd", name);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const classified = classifyError(error);
      const level = classified.kind === "validation" ? "warn" : "error";
      logger[level](
        {
          evt: "cmd_error",
          traceId,
          cmd: name,
          kind,
          phase,
          ...errorContext(classified),
          err: error,
        },
        `command error: ${classified.message}`
      );

      try {
        await replyOrEdit(interaction, {
          content: `❌ ${userFriendlyMessage(classified)}\n-# trace \`${traceId}\``,
        });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to post error reply");
      }
    }
  };
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless the
 * payload says otherwise; public responses should be explicit.
 * 10062 (expired) and 40060 (already acknowledged) are logged and skipped.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const classified = classifyError(err);
    const code = classified.kind === "discord_api" ? classified.code : undefined;
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, err };
    if (code === 10062) {
      logger.warn(logPayload, "reply skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
