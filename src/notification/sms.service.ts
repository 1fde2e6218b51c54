import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfig } from '../config/configuration';
import { describeError } from '../common/service-result';

const TWILIO_API_URL = 'https://api.twilio.com/2010-04-01';

interface TwilioMessageResponse {
  sid?: string;
  message?: string;
}

/**
 * Text-message sink. `send` resolves to whether the carrier accepted the
 * message and never rejects.
 */
@Injectable()
export class SmsService {
  private readonly logger = new Logger(SmsService.name);

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async send(to: string, body: string): Promise<boolean> {
    const { accountSid, authToken, fromNumber } = this.configService.get(
      'sms',
      { infer: true },
    );

    if (!accountSid || !authToken || !fromNumber) {
      this.logger.log(`SMS not configured. Would send to ${to}: ${body}`);
      return false;
    }

    const form = new URLSearchParams();
    form.append('To', to);
    form.append('From', fromNumber);
    form.append('Body', body);

    try {
      const response = await axios.post<TwilioMessageResponse>(
        `${TWILIO_API_URL}/Accounts/${accountSid}/Messages.json`,
        form.toString(),
        {
          auth: { username: accountSid, password: authToken },
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: 10000,
        },
      );

      if (response.data?.sid) {
        this.logger.log(`SMS sent to ${to}. SID: ${response.data.sid}`);
        return true;
      }

      this.logger.error(
        `SMS to ${to} was not accepted: ${response.data?.message ?? 'no message sid returned'}. Message: ${body}`,
      );
      return false;
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to send SMS to ${to}: ${message}. Message: ${body}`,
        stack,
      );
      return false;
    }
  }
}
