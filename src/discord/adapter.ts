/**
 * Discord transport: turns gateway events into router events and slash
 * commands, and implements the chat surface the router writes to.
 */

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  Partials,
  SlashCommandBuilder,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type Message,
  type SendableChannels,
  type TextBasedChannel,
} from "discord.js";
import type { CommandContext, CommandInvocation, CommandReply } from "../bridge/commands.ts";
import type { ChatSurface, InboundEvent, SendOptions } from "../bridge/types.ts";
import { CANCEL_BUTTON_ID, shouldProcessMessage, stripBotMention } from "./messages.ts";

export interface DiscordAdapterOptions {
  token: string;
  /** Register slash commands in this guild only (instant); global otherwise */
  guildId?: string;
  requireMention: boolean;
  threadArchiveMinutes: number;
}

export interface DiscordHandlers {
  onMessage(event: InboundEvent): Promise<unknown>;
  onCommand(ctx: CommandContext, invocation: CommandInvocation): Promise<CommandReply>;
}

type ChannelInfo = Omit<CommandContext, "threadId"> & { threadId?: string };

function describeChannel(channel: TextBasedChannel | null): ChannelInfo | null {
  if (!channel) return null;
  if (channel.isThread()) {
    const parent = channel.parent;
    return {
      channelId: channel.parentId ?? channel.id,
      channelName: parent?.name ?? channel.name,
      categoryName: parent?.parent?.name,
      threadId: channel.id,
    };
  }
  if (channel.isDMBased()) return null;
  return {
    channelId: channel.id,
    channelName: channel.name,
    categoryName: channel.parent?.name,
  };
}

export function commandDefinitions() {
  return [
    new SlashCommandBuilder()
      .setName("status")
      .setDescription("Show this channel's project, branch and session"),
    new SlashCommandBuilder()
      .setName("bind")
      .setDescription("Bind this channel to a project")
      .addStringOption((opt) =>
        opt.setName("project").setDescription("Project to bind").setRequired(true),
      )
      .addStringOption((opt) =>
        opt.setName("branch").setDescription("Fixed branch (defaults to the channel name)"),
      ),
    new SlashCommandBuilder().setName("unbind").setDescription("Remove this channel's binding"),
    new SlashCommandBuilder()
      .setName("cancel")
      .setDescription("Cancel the running agent turn in this thread"),
  ].map((builder) => builder.toJSON());
}

function toInvocation(interaction: ChatInputCommandInteraction): CommandInvocation | null {
  switch (interaction.commandName) {
    case "status":
    case "unbind":
    case "cancel":
      return { name: interaction.commandName };
    case "bind": {
      const project = interaction.options.getString("project", true);
      const branch = interaction.options.getString("branch") ?? undefined;
      return branch ? { name: "bind", project, branch } : { name: "bind", project };
    }
    default:
      return null;
  }
}

function cancelRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(CANCEL_BUTTON_ID).setLabel("Cancel").setStyle(ButtonStyle.Secondary),
  );
}

export class DiscordAdapter implements ChatSurface {
  private client: Client | null = null;
  private accepting = true;
  private options: DiscordAdapterOptions;
  private handlers: DiscordHandlers;

  constructor(options: DiscordAdapterOptions, handlers: DiscordHandlers) {
    this.options = options;
    this.handlers = handlers;
  }

  async start(): Promise<void> {
    const client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
      ],
      partials: [Partials.Channel, Partials.Message],
    });
    this.client = client;

    client.once(Events.ClientReady, (c) => {
      console.log(`[discord] Logged in as ${c.user.tag}`);
      const guildId = this.options.guildId;
      const registration = guildId
        ? c.application.commands.set(commandDefinitions(), guildId)
        : c.application.commands.set(commandDefinitions());
      registration
        .then(() => console.log(`[discord] Registered slash commands${guildId ? ` in guild ${guildId}` : ""}`))
        .catch((err: unknown) => console.error("[discord] Failed to register slash commands:", err));
    });

    client.on(Events.MessageCreate, (message) => this.onMessage(message));

    client.on(Events.InteractionCreate, (interaction) => {
      if (!this.accepting) return;
      if (interaction.isChatInputCommand()) {
        void this.onSlashCommand(interaction);
      } else if (interaction.isButton() && interaction.customId === CANCEL_BUTTON_ID) {
        void this.onCancelButton(interaction);
      }
    });

    client.on(Events.Error, (err) => console.error("[discord] Client error:", err));

    await client.login(this.options.token);
  }

  /** Stop handing inbound events to the bridge; outbound calls keep working. */
  pause(): void {
    this.accepting = false;
  }

  async stop(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
    }
  }

  // ── ChatSurface ──

  async sendMessage(targetId: string, text: string, options: SendOptions = {}): Promise<string> {
    const channel = await this.sendableChannel(targetId);
    const sent = await channel.send({
      content: text,
      components: options.cancellable ? [cancelRow()] : [],
      allowedMentions: { parse: [] },
    });
    return sent.id;
  }

  async editMessage(targetId: string, messageId: string, text: string): Promise<void> {
    const channel = await this.sendableChannel(targetId);
    const message = await channel.messages.fetch(messageId);
    await message.edit({ content: text, components: [], allowedMentions: { parse: [] } });
  }

  async createThread(channelId: string, name: string, sourceMessageId?: string): Promise<string> {
    const channel = await this.requireClient().channels.fetch(channelId);
    const autoArchiveDuration = this.options.threadArchiveMinutes;

    if (channel?.type !== ChannelType.GuildText && channel?.type !== ChannelType.GuildAnnouncement) {
      throw new Error(`Cannot create a thread in channel ${channelId}`);
    }
    if (sourceMessageId) {
      const source = await channel.messages.fetch(sourceMessageId);
      const thread = await source.startThread({ name, autoArchiveDuration });
      return thread.id;
    }
    if (channel.type !== ChannelType.GuildText) {
      throw new Error(`Threads in announcement channel ${channelId} need a source message`);
    }
    const thread = await channel.threads.create({ name, autoArchiveDuration });
    return thread.id;
  }

  // ── Inbound ──

  private onMessage(message: Message): void {
    const botId = this.client?.user?.id;
    if (!this.accepting || !botId || message.author.id === botId || !message.inGuild()) return;

    const info = describeChannel(message.channel);
    if (!info) return;

    const facts = {
      authorIsBot: message.author.bot,
      inThread: info.threadId !== undefined,
      mentionsBot: message.mentions.users.has(botId),
      content: message.content,
    };
    if (!shouldProcessMessage(facts, { requireMention: this.options.requireMention })) return;

    const text = stripBotMention(message.content, botId);
    if (!text) return;

    const event: InboundEvent = {
      messageId: message.id,
      channelId: info.channelId,
      channelName: info.channelName,
      categoryName: info.categoryName,
      threadId: info.threadId,
      isThread: info.threadId !== undefined,
      author: { id: message.author.id, name: message.author.username },
      text,
    };

    this.handlers.onMessage(event).catch((err: unknown) => {
      console.error(`[discord] Handler failed for message ${message.id}:`, err);
    });
  }

  private async onSlashCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const invocation = toInvocation(interaction);
    const info = describeChannel(interaction.channel);
    if (!invocation) return;

    try {
      const reply: CommandReply = info
        ? await this.handlers.onCommand(info, invocation)
        : { ok: false, text: "This command can only be used in a server channel." };
      await interaction.reply({ content: reply.text, flags: MessageFlags.Ephemeral });
    } catch (err) {
      console.error(`[discord] /${interaction.commandName} failed:`, err);
    }
  }

  private async onCancelButton(interaction: ButtonInteraction): Promise<void> {
    const info = describeChannel(interaction.channel);
    try {
      const reply: CommandReply = info
        ? await this.handlers.onCommand(info, { name: "cancel" })
        : { ok: false, text: "Nothing to cancel here." };
      await interaction.reply({ content: reply.text, flags: MessageFlags.Ephemeral });
    } catch (err) {
      console.error("[discord] Cancel button failed:", err);
    }
  }

  private requireClient(): Client {
    if (!this.client) throw new Error("Discord client is not started");
    return this.client;
  }

  private async sendableChannel(targetId: string): Promise<SendableChannels> {
    const channel = await this.requireClient().channels.fetch(targetId);
    if (!channel?.isSendable()) {
      throw new Error(`Channel ${targetId} does not accept messages`);
    }
    return channel;
  }
}
