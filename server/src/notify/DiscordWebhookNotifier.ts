import { AttachmentBuilder, EmbedBuilder, WebhookClient, type WebhookMessageCreateOptions } from 'discord.js';
import { logger } from '../logger.js';
import { NotificationDeliveryError } from './errors.js';
import type { Notification, NotificationSink } from './types.js';

export interface DiscordWebhookOptions {
  /** Overrides the webhook's configured display name. */
  username?: string;
  /** Role pinged with every notification. */
  mentionRoleId?: string;
}

type WebhookSender = Pick<WebhookClient, 'send' | 'destroy'>;

// Discord rejects empty embed field values
const BLANK = '\u200B';

export function buildEmbed(notification: Notification): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle(notification.title).setURL(notification.url);

  if (notification.description) embed.setDescription(notification.description);
  if (notification.color !== undefined) embed.setColor(notification.color);
  if (notification.timestamp) embed.setTimestamp(notification.timestamp);
  if (notification.fields && notification.fields.length > 0) {
    embed.addFields(
      notification.fields.map((f) => ({ name: f.name, value: f.value || BLANK, inline: f.inline ?? false })),
    );
  }
  if (notification.image) embed.setImage(`attachment://${notification.image.name}`);

  return embed;
}

/**
 * Posts notifications to one Discord channel through a webhook.
 * A failed post is reported as NotificationDeliveryError and never retried here.
 */
export class DiscordWebhookNotifier implements NotificationSink {
  constructor(
    private webhook: WebhookSender,
    private options: DiscordWebhookOptions = {},
  ) {}

  static fromUrl(url: string, options: DiscordWebhookOptions = {}): DiscordWebhookNotifier {
    return new DiscordWebhookNotifier(new WebhookClient({ url }), options);
  }

  buildMessage(notification: Notification): WebhookMessageCreateOptions {
    const message: WebhookMessageCreateOptions = {
      embeds: [buildEmbed(notification)],
      files: notification.image
        ? [new AttachmentBuilder(notification.image.data, { name: notification.image.name })]
        : [],
    };

    if (this.options.username) message.username = this.options.username;
    if (this.options.mentionRoleId) {
      message.content = `<@&${this.options.mentionRoleId}>`;
      message.allowedMentions = { roles: [this.options.mentionRoleId] };
    }
    return message;
  }

  async post(notification: Notification): Promise<void> {
    try {
      await this.webhook.send(this.buildMessage(notification));
      logger.debug(`[Discord] Posted ${notification.kind} notification for ${notification.login}`);
    } catch (err) {
      throw new NotificationDeliveryError(
        `Discord webhook post for ${notification.login} (${notification.kind}) failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  destroy(): void {
    this.webhook.destroy();
  }
}
