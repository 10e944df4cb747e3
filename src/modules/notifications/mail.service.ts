/// <reference path="../../@types/zeptomail/index.d.ts" />
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SendMailClient } from 'zeptomail';
import { GradewiseLogger } from '../../lib/logger';

export interface MailSendOptions {
  to: string | string[];
  subject: string;
  text?: string;
  html: string;
  from?: string;
}

@Injectable()
export class MailService {
  private readonly defaultFrom: string;
  private readonly client: SendMailClient;

  constructor(
    private readonly cfg: ConfigService,
    private readonly logger: GradewiseLogger,
  ) {
    this.logger.setContext(MailService.name);
    const url = this.cfg.get<string>('ZEPTO_URL') ?? 'api.zeptomail.com/';
    const token = this.cfg.get<string>('ZEPTO_TOKEN') ?? '';
    this.client = new SendMailClient({ url, token });
    this.defaultFrom =
      this.cfg.get<string>('ZEPTO_FROM') ?? 'no-reply@example.com';
  }

  async send(options: MailSendOptions): Promise<void> {
    const to = Array.isArray(options.to) ? options.to : [options.to];
    const response: unknown = await this.client.sendMail({
      from: {
        address: options.from ?? this.defaultFrom,
        name: 'Gradewise',
      },
      to: to.map((address) => ({
        email_address: {
          address,
          name: address,
        },
      })),
      subject: options.subject,
      textbody: options.text ?? '',
      htmlbody: options.html,
    });
    this.logger.debug(`Email sent: ${JSON.stringify(response)}`);
  }
}
