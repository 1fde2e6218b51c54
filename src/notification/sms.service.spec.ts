import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { SmsService } from './sms.service';
import { testConfig } from '../../test/fakes';

const twilioEnv = {
  TWILIO_ACCOUNT_SID: 'AC-test',
  TWILIO_AUTH_TOKEN: 'test-secret',
  TWILIO_PHONE_NUMBER: '+15550199',
};

const response = <T>(data: T): AxiosResponse<T> => ({
  data,
  status: 201,
  statusText: 'Created',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

describe('SmsService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('does not call the carrier when credentials are missing', async () => {
    const post = jest.spyOn(axios, 'post');
    const sms = new SmsService(testConfig());

    await expect(sms.send('+15550100', 'hello')).resolves.toBe(false);
    expect(post).not.toHaveBeenCalled();
  });

  it('posts a form-encoded message and reports acceptance', async () => {
    const post = jest
      .spyOn(axios, 'post')
      .mockResolvedValueOnce(response({ sid: 'SM123' }));
    const sms = new SmsService(testConfig(twilioEnv));

    await expect(sms.send('+15550100', 'Your car is ready')).resolves.toBe(true);

    expect(post).toHaveBeenCalledTimes(1);
    const [url, body, config] = post.mock.calls[0];
    expect(url).toBe(
      'https://api.twilio.com/2010-04-01/Accounts/AC-test/Messages.json',
    );
    expect(body).toBe('To=%2B15550100&From=%2B15550199&Body=Your+car+is+ready');
    expect(config).toMatchObject({
      auth: { username: 'AC-test', password: 'test-secret' },
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
  });

  it('reports false when no message sid comes back', async () => {
    jest
      .spyOn(axios, 'post')
      .mockResolvedValueOnce(response({ message: 'invalid number' }));
    const sms = new SmsService(testConfig(twilioEnv));

    await expect(sms.send('+15550100', 'hi')).resolves.toBe(false);
  });

  it('reports false instead of throwing on a transport error', async () => {
    jest.spyOn(axios, 'post').mockRejectedValueOnce(new Error('ECONNRESET'));
    const sms = new SmsService(testConfig(twilioEnv));

    await expect(sms.send('+15550100', 'hi')).resolves.toBe(false);
  });
});
