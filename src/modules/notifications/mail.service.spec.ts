import { ConfigService } from '@nestjs/config';
import { SendMailClient } from 'zeptomail';
import { mockLogger } from '../../testing';
import { MailService } from './mail.service';

const mockSendMail = jest.fn();

jest.mock('zeptomail', () => ({
  SendMailClient: jest.fn().mockImplementation(() => ({
    sendMail: (...args: unknown[]) => mockSendMail(...args),
  })),
}));

describe('MailService', () => {
  beforeEach(() => {
    mockSendMail.mockReset();
    mockSendMail.mockResolvedValue({ data: [] });
  });

  it('sends through the configured zeptomail account', async () => {
    const service = new MailService(
      new ConfigService({
        ZEPTO_URL: 'api.zeptomail.eu/',
        ZEPTO_TOKEN: 'test-token',
        ZEPTO_FROM: 'grades@example.com',
      }),
      mockLogger(),
    );

    await service.send({
      to: 'student@example.com',
      subject: 'Your grade',
      html: '<p>72</p>',
    });

    expect(SendMailClient).toHaveBeenCalledWith({
      url: 'api.zeptomail.eu/',
      token: 'test-token',
    });
    expect(mockSendMail).toHaveBeenCalledWith({
      from: { address: 'grades@example.com', name: 'Gradewise' },
      to: [
        {
          email_address: {
            address: 'student@example.com',
            name: 'student@example.com',
          },
        },
      ],
      subject: 'Your grade',
      textbody: '',
      htmlbody: '<p>72</p>',
    });
  });
});
