export type RgbaFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export interface MotionEvent {
  readonly timestamp: number;
  readonly frame: Readonly<RgbaFrame> | null;
  readonly motionArea: number;
  readonly numContours: number;
}

export interface StatsSnapshot {
  events: number;
  totalMotionArea: number;
  maxMotionArea: number;
  maxContours: number;
  anomalies: number;
}

export interface MailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface MailMessage {
  to: string;
  subject: string;
  body: string;
  from?: string;
  attachment?: MailAttachment;
}

export interface MailTransport {
  send(message: MailMessage): Promise<string>;
}

export type StorageBackendName = 'keyring' | 'file';

export type AuthorizationMode = 'local_server' | 'console';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
