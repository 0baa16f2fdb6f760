export type NotificationKind = 'live' | 'ended' | 'gameChanged';

export interface NotificationField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface NotificationImage {
  /** File name the attachment is uploaded under. */
  name: string;
  data: Buffer;
}

export interface Notification {
  kind: NotificationKind;
  login: string;
  title: string;
  description: string;
  url: string;
  color?: number;
  fields?: NotificationField[];
  image?: NotificationImage;
  timestamp?: Date;
}

/** Anything that can deliver a notification. One attempt per call. */
export interface NotificationSink {
  post(notification: Notification): Promise<void>;
}
