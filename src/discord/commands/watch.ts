/**
 * /watch command - Create, list and manage watches
 */
import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  EmbedBuilder,
  MessageFlags,
} from "discord.js";
import { z } from "zod";
import type { NewWatch, Watch, WatchUpdate } from "../../db/schema";
import { isCalendarDate, isClockTime } from "../../filters";
import { errorMessage } from "../../errors";
import { componentLogger } from "../../logger";
import { COLORS, type CommandContext } from "../context";

const logger = componentLogger("discord");

const DEFAULT_PARTY_SIZE = 2;
const DEFAULT_TIME_EARLIEST = "17:00";
const DEFAULT_TIME_LATEST = "22:00";

const dateField = z
  .string()
  .refine(isCalendarDate, { message: "must be a date in YYYY-MM-DD format" });
const timeField = z
  .string()
  .refine(isClockTime, { message: "must be a time in HH:mm format (e.g., 18:00)" });

/**
 * Validated input for a new watch
 */
export const WatchInputSchema = z
  .object({
    venue_id: z.string().regex(/^\d+$/, "must be a numeric Resy venue id"),
    venue_name: z.string().trim().default(""),
    party_size: z.number().int().min(1).max(20).default(DEFAULT_PARTY_SIZE),
    date_start: dateField,
    date_end: dateField.nullable().default(null),
    time_earliest: timeField.nullable().default(DEFAULT_TIME_EARLIEST),
    time_latest: timeField.nullable().default(DEFAULT_TIME_LATEST),
    snipe_mode: z.boolean().default(false),
  })
  .refine((w) => w.date_end === null || w.date_start <= w.date_end, {
    message: "date_end must not be before date_start",
    path: ["date_end"],
  })
  .refine(
    (w) => w.time_earliest === null || w.time_latest === null || w.time_earliest <= w.time_latest,
    {
      message: "time_latest must not be before time_earliest",
      path: ["time_latest"],
    }
  );

export type WatchInput = z.input<typeof WatchInputSchema>;

/**
 * Validate raw input into a storable watch
 */
export function buildWatch(
  input: WatchInput
): { ok: true; watch: NewWatch } | { ok: false; error: string } {
  const parsed = WatchInputSchema.safeParse(input);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "input"} ${issue.message}`)
      .join("\n");
    return { ok: false, error };
  }
  return { ok: true, watch: { ...parsed.data, active: true } };
}

export type WatchEdit = Pick<
  WatchUpdate,
  "party_size" | "date_start" | "date_end" | "time_earliest" | "time_latest"
>;

/**
 * Merge an edit over an existing watch and validate the result as a whole.
 * Only the edited fields come back as changes.
 */
export function applyWatchEdit(
  watch: Watch,
  edit: WatchEdit
): { ok: true; changes: WatchUpdate } | { ok: false; error: string } {
  const built = buildWatch({
    venue_id: watch.venue_id,
    venue_name: watch.venue_name,
    party_size: edit.party_size ?? watch.party_size,
    date_start: edit.date_start ?? watch.date_start,
    date_end: edit.date_end ?? watch.date_end,
    time_earliest: edit.time_earliest ?? watch.time_earliest,
    time_latest: edit.time_latest ?? watch.time_latest,
    snipe_mode: watch.snipe_mode,
  });
  if (!built.ok) return built;

  const changes: WatchUpdate = {};
  if (edit.party_size != null) changes.party_size = built.watch.party_size;
  if (edit.date_start != null) changes.date_start = built.watch.date_start;
  if (edit.date_end != null) changes.date_end = built.watch.date_end;
  if (edit.time_earliest != null) changes.time_earliest = built.watch.time_earliest;
  if (edit.time_latest != null) changes.time_latest = built.watch.time_latest;

  if (Object.keys(changes).length === 0) {
    return { ok: false, error: "Nothing to change" };
  }
  return { ok: true, changes };
}

/**
 * One-line summary of a watch for list output
 */
export function describeWatch(watch: Watch): string {
  const dates = watch.date_end && watch.date_end !== watch.date_start
    ? `${watch.date_start} to ${watch.date_end}`
    : watch.date_start;
  const window = `${watch.time_earliest ?? "any"}-${watch.time_latest ?? "any"}`;
  const flags = [
    watch.active ? "active" : "paused",
    watch.snipe_mode ? "snipe" : null,
  ].filter(Boolean).join(", ");
  const checked = watch.last_checked ? watch.last_checked.toISOString() : "never";

  return (
    `**#${watch.id} ${watch.venue_name || watch.venue_id}** (${flags})\n` +
    `  Party: ${watch.party_size} | ${dates} | ${window}\n` +
    `  Last checked: ${checked}`
  );
}

export const watchCommand = new SlashCommandBuilder()
  .setName("watch")
  .setDescription("Manage reservation watches")
  .addSubcommand((sub) =>
    sub
      .setName("add")
      .setDescription("Watch a venue for openings")
      .addStringOption((option) =>
        option.setName("venue_id").setDescription("Resy venue ID (see /search)").setRequired(true)
      )
      .addStringOption((option) =>
        option.setName("date_start").setDescription("First date (YYYY-MM-DD)").setRequired(true)
      )
      .addStringOption((option) =>
        option.setName("date_end").setDescription("Last date (YYYY-MM-DD, default: date_start)")
      )
      .addStringOption((option) =>
        option.setName("venue_name").setDescription("Display name (default: looked up from Resy)")
      )
      .addIntegerOption((option) =>
        option
          .setName("party_size")
          .setDescription("Number of guests (default: 2)")
          .setMinValue(1)
          .setMaxValue(20)
      )
      .addStringOption((option) =>
        option.setName("time_earliest").setDescription("Earliest time (HH:mm, default: 17:00)")
      )
      .addStringOption((option) =>
        option.setName("time_latest").setDescription("Latest time (HH:mm, default: 22:00)")
      )
      .addBooleanOption((option) =>
        option.setName("snipe").setDescription("Book automatically when a slot opens")
      )
  )
  .addSubcommand((sub) => sub.setName("list").setDescription("Show all watches"))
  .addSubcommand((sub) =>
    sub
      .setName("edit")
      .setDescription("Change the party size, dates or time window of a watch")
      .addIntegerOption((option) => option.setName("id").setDescription("Watch ID").setRequired(true))
      .addIntegerOption((option) =>
        option.setName("party_size").setDescription("Number of guests").setMinValue(1).setMaxValue(20)
      )
      .addStringOption((option) =>
        option.setName("date_start").setDescription("First date (YYYY-MM-DD)")
      )
      .addStringOption((option) =>
        option.setName("date_end").setDescription("Last date (YYYY-MM-DD)")
      )
      .addStringOption((option) =>
        option.setName("time_earliest").setDescription("Earliest time (HH:mm)")
      )
      .addStringOption((option) =>
        option.setName("time_latest").setDescription("Latest time (HH:mm)")
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("remove")
      .setDescription("Delete a watch")
      .addIntegerOption((option) => option.setName("id").setDescription("Watch ID").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("pause")
      .setDescription("Stop scanning a watch")
      .addIntegerOption((option) => option.setName("id").setDescription("Watch ID").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("resume")
      .setDescription("Resume scanning a watch")
      .addIntegerOption((option) => option.setName("id").setDescription("Watch ID").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("snipe")
      .setDescription("Turn auto-booking on or off for a watch")
      .addIntegerOption((option) => option.setName("id").setDescription("Watch ID").setRequired(true))
      .addBooleanOption((option) =>
        option.setName("enabled").setDescription("Auto-book new slots").setRequired(true)
      )
  );

export async function handleWatch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<void> {
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const subcommand = interaction.options.getSubcommand();
    let embed: EmbedBuilder;

    switch (subcommand) {
      case "add":
        embed = await addWatch(interaction, context);
        break;
      case "list":
        embed = await listWatches(context);
        break;
      case "edit":
        embed = await editWatch(interaction, context);
        break;
      case "remove":
        embed = await removeWatch(interaction.options.getInteger("id", true), context);
        break;
      case "pause":
      case "resume":
        embed = await updateWatch(
          interaction.options.getInteger("id", true),
          { active: subcommand === "resume" },
          context
        );
        break;
      case "snipe":
        embed = await updateWatch(
          interaction.options.getInteger("id", true),
          { snipe_mode: interaction.options.getBoolean("enabled", true) },
          context
        );
        break;
      default:
        embed = new EmbedBuilder()
          .setTitle("Unknown Subcommand")
          .setDescription(`/watch ${subcommand} is not supported`)
          .setColor(COLORS.error);
    }

    await interaction.editReply({ embeds: [embed] });
  } catch (error) {
    const embed = new EmbedBuilder()
      .setTitle("Error")
      .setDescription(`An error occurred: ${errorMessage(error)}`)
      .setColor(COLORS.error);

    await interaction.editReply({ embeds: [embed] });
  }
}

async function addWatch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<EmbedBuilder> {
  const venueId = interaction.options.getString("venue_id", true).trim();
  let venueName = interaction.options.getString("venue_name") ?? "";

  const built = buildWatch({
    venue_id: venueId,
    venue_name: venueName,
    party_size: interaction.options.getInteger("party_size") ?? undefined,
    date_start: interaction.options.getString("date_start", true),
    date_end: interaction.options.getString("date_end"),
    time_earliest: interaction.options.getString("time_earliest") ?? undefined,
    time_latest: interaction.options.getString("time_latest") ?? undefined,
    snipe_mode: interaction.options.getBoolean("snipe") ?? undefined,
  });

  if (!built.ok) {
    return new EmbedBuilder()
      .setTitle("Invalid Watch")
      .setDescription(built.error)
      .setColor(COLORS.error);
  }

  if (!venueName) {
    venueName = (await lookupVenueName(venueId, context)) ?? "";
  }

  const watch = await context.stores.watches.create({ ...built.watch, venue_name: venueName });
  await context.stores.activity.append(
    watch.id,
    "watch",
    `Added watch: ${watch.venue_name || watch.venue_id}`
  );

  return new EmbedBuilder()
    .setTitle("Watch Created")
    .setDescription(describeWatch(watch))
    .setColor(COLORS.success)
    .setFooter({ text: "Use /monitor start to begin scanning" });
}

/**
 * Best-effort name lookup; a failure just leaves the name blank
 */
async function lookupVenueName(venueId: string, context: CommandContext): Promise<string | undefined> {
  const client = await context.resyClient();
  if (!client) return undefined;

  try {
    const venue = await client.getVenue(venueId);
    return venue.name;
  } catch (error) {
    logger.debug({ venueId, error: errorMessage(error) }, "Venue lookup failed");
    return undefined;
  }
}

async function listWatches(context: CommandContext): Promise<EmbedBuilder> {
  const watches = await context.stores.watches.listAll();

  const embed = new EmbedBuilder().setTitle("Watches").setColor(COLORS.info);
  if (watches.length === 0) {
    return embed.setDescription("None - use /watch add to create one");
  }

  return embed
    .setTitle(`Watches (${watches.length})`)
    .setDescription(watches.map(describeWatch).join("\n\n").slice(0, 4096));
}

async function removeWatch(id: number, context: CommandContext): Promise<EmbedBuilder> {
  const removed = await context.stores.watches.delete(id);
  if (!removed) {
    return new EmbedBuilder()
      .setTitle("Not Found")
      .setDescription(`No watch with ID ${id}`)
      .setColor(COLORS.warning);
  }

  return new EmbedBuilder()
    .setTitle("Watch Removed")
    .setDescription(`Watch #${id} deleted`)
    .setColor(COLORS.info);
}

async function editWatch(
  interaction: ChatInputCommandInteraction,
  context: CommandContext
): Promise<EmbedBuilder> {
  const id = interaction.options.getInteger("id", true);
  const watch = await context.stores.watches.getById(id);
  if (!watch) {
    return new EmbedBuilder()
      .setTitle("Not Found")
      .setDescription(`No watch with ID ${id}`)
      .setColor(COLORS.warning);
  }

  const edited = applyWatchEdit(watch, {
    party_size: interaction.options.getInteger("party_size") ?? undefined,
    date_start: interaction.options.getString("date_start") ?? undefined,
    date_end: interaction.options.getString("date_end") ?? undefined,
    time_earliest: interaction.options.getString("time_earliest") ?? undefined,
    time_latest: interaction.options.getString("time_latest") ?? undefined,
  });

  if (!edited.ok) {
    return new EmbedBuilder()
      .setTitle("Invalid Watch")
      .setDescription(edited.error)
      .setColor(COLORS.error);
  }

  return updateWatch(id, edited.changes, context);
}

async function updateWatch(
  id: number,
  changes: WatchUpdate,
  context: CommandContext
): Promise<EmbedBuilder> {
  const updated = await context.stores.watches.update(id, changes);
  if (!updated) {
    return new EmbedBuilder()
      .setTitle("Not Found")
      .setDescription(`No watch with ID ${id}`)
      .setColor(COLORS.warning);
  }

  return new EmbedBuilder()
    .setTitle("Watch Updated")
    .setDescription(describeWatch(updated))
    .setColor(COLORS.success);
}
