import { OAuth2Client } from 'google-auth-library';
import MailComposer from 'nodemailer/lib/mail-composer/index.js';
import loggerModule, { type Logger } from '../logger.js';
import { MailSendError } from '../errors.js';
import type { Credential } from '../auth/credential.js';
import type { MailMessage, MailTransport } from '../types.js';

export const GMAIL_SEND_URL = 'https://gmail.googleapis.com/gmail/v1/users/me/messages/send';

export interface MailApi {
  sendRaw(raw: string, credential: Credential): Promise<string>;
}

type SendResponse = {
  id?: string;
};

export class GoogleMailApi implements MailApi {
  constructor(
    private readonly createClient: (credential: Credential) => OAuth2Client = credential =>
      new OAuth2Client({ clientId: credential.clientId, clientSecret: credential.clientSecret })
  ) {}

  async sendRaw(raw: string, credential: Credential): Promise<string> {
    const client = this.createClient(credential);
    client.setCredentials({
      access_token: credential.token,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiresAt
    });
    const response = await client.request<SendResponse>({
      url: GMAIL_SEND_URL,
      method: 'POST',
      data: { raw }
    });
    return response.data.id ?? '';
  }
}

export async function buildRawMessage(message: MailMessage): Promise<string> {
  const composer = new MailComposer({
    to: message.to,
    from: message.from,
    subject: message.subject,
    text: message.body,
    attachments: message.attachment
      ? [
          {
            filename: message.attachment.filename,
            content: message.attachment.content,
            contentType: message.attachment.contentType
          }
        ]
      : undefined
  });

  const built = await new Promise<Buffer>((resolve, reject) => {
    composer.compile().build((error, buffer) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(buffer);
    });
  });

  return built.toString('base64url');
}

export type GmailTransportOptions = {
  credentials: () => Promise<Credential>;
  api?: MailApi;
  logger?: Logger;
};

export class GmailTransport implements MailTransport {
  private readonly api: MailApi;
  private readonly logger: Logger;

  constructor(private readonly options: GmailTransportOptions) {
    this.api = options.api ?? new GoogleMailApi();
    this.logger = options.logger ?? loggerModule;
  }

  async send(message: MailMessage): Promise<string> {
    const credential = await this.options.credentials();
    const raw = await buildRawMessage(message);

    let id: string;
    try {
      id = await this.api.sendRaw(raw, credential);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MailSendError(`Gmail send failed: ${detail}`, { cause: error });
    }

    this.logger.debug(
      { id, to: message.to, attachment: message.attachment?.filename ?? null },
      'Mail sent'
    );
    return id;
  }
}
