import TelegramBot from 'node-telegram-bot-api';
import { TelegramDigestSender } from '../../src/bot/TelegramDigestSender';

const mockSendMessage = jest.fn();

jest.mock('node-telegram-bot-api', () =>
  jest.fn().mockImplementation(() => ({ sendMessage: mockSendMessage })),
);

describe('TelegramDigestSender', () => {
  let sender: TelegramDigestSender;

  beforeEach(() => {
    sender = new TelegramDigestSender({ token: 'test-token', chatId: '-100123' });
  });

  it('creates a bot without polling', () => {
    expect(TelegramBot).toHaveBeenCalledWith('test-token', { polling: false });
  });

  it('sends nothing for an empty digest', async () => {
    const result = await sender.send({ title: 'Defense Brief', messages: [] });

    expect(result).toEqual({ success: true, messagesSent: 0 });
    expect(mockSendMessage).not.toHaveBeenCalled();
  });

  it('sends every message in order as HTML', async () => {
    mockSendMessage.mockResolvedValue({ message_id: 1 });

    const result = await sender.send({
      title: 'Defense Brief',
      messages: ['first', 'second'],
    });

    expect(result).toEqual({ success: true, messagesSent: 2 });
    expect(mockSendMessage.mock.calls).toEqual([
      ['-100123', 'first', { parse_mode: 'HTML', disable_web_page_preview: true }],
      ['-100123', 'second', { parse_mode: 'HTML', disable_web_page_preview: true }],
    ]);
  });

  it('stops at the first failed message', async () => {
    mockSendMessage
      .mockResolvedValueOnce({ message_id: 1 })
      .mockRejectedValueOnce(new Error('ETELEGRAM: 400 Bad Request'));

    const result = await sender.send({
      title: 'Defense Brief',
      messages: ['first', 'second', 'third'],
    });

    expect(result).toEqual({
      success: false,
      messagesSent: 1,
      error: 'ETELEGRAM: 400 Bad Request',
    });
    expect(mockSendMessage).toHaveBeenCalledTimes(2);
  });

  it('fails when Telegram returns no message id', async () => {
    mockSendMessage.mockResolvedValueOnce({});

    const result = await sender.send({ title: 'Defense Brief', messages: ['only'] });

    expect(result).toEqual({
      success: false,
      messagesSent: 0,
      error: 'Telegram returned no message id',
    });
  });
});
