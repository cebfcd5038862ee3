import { ErrorFactory } from '../utils/error-handler';

export interface ChannelSetting {
  id: string;
  postLoginBu?: string;
}

/**
 * Maps the channel a customer signs in from to the business unit that owns
 * the post-login session.
 */
export class ChannelRegistry {
  private readonly channels: Map<string, ChannelSetting>;

  constructor(channelBusinessUnits: Record<string, string>) {
    this.channels = new Map(
      Object.entries(channelBusinessUnits).map(([id, bu]) => [id, { id, postLoginBu: bu }])
    );
  }

  getChannelSetting(channelId: string): ChannelSetting | undefined {
    return this.channels.get(channelId);
  }

  resolveBusinessUnit(channelId: string): string {
    const setting = this.getChannelSetting(channelId);
    if (!setting) {
      throw ErrorFactory.createConfigurationError(
        `Cannot find channel with id ${channelId}`,
        undefined,
        { channelId }
      );
    }

    const bu = setting.postLoginBu?.trim();
    if (!bu) {
      throw ErrorFactory.createConfigurationError(
        `Missing BU in channel with id ${channelId}`,
        undefined,
        { channelId }
      );
    }

    return bu.toUpperCase();
  }
}
