import { CommandHandler, ASK_COMMAND } from '../command.handler';

describe('CommandHandler', () => {
  let handler: CommandHandler;
  let mockSlackService: any;
  let mockDispatcher: any;
  let registeredCommands: Map<string, Function>;

  beforeEach(() => {
    jest.clearAllMocks();
    registeredCommands = new Map();

    mockSlackService = {
      getApp: jest.fn().mockReturnValue({
        command: jest.fn((name: string, fn: Function) => {
          registeredCommands.set(name, fn);
        }),
      }),
    };

    mockDispatcher = {
      dispatch: jest
        .fn()
        .mockReturnValue({ handled: true, reply: 'Outlook good.' }),
    };

    handler = new CommandHandler(mockSlackService, mockDispatcher);
    handler.onModuleInit();
  });

  describe('command registration', () => {
    it('should register /ask8ball', () => {
      expect(ASK_COMMAND).toBe('/ask8ball');
      expect(registeredCommands.has('/ask8ball')).toBe(true);
    });

    it('should skip registration when Socket Mode is disabled', () => {
      mockSlackService.getApp.mockReturnValue(null);
      const inert = new CommandHandler(mockSlackService, mockDispatcher);
      expect(() => inert.onModuleInit()).not.toThrow();
    });
  });

  describe('/ask8ball', () => {
    it('should ack with the computed reply', async () => {
      const ack = jest.fn().mockResolvedValue(undefined);
      const fn = registeredCommands.get('/ask8ball')!;

      await fn({
        command: {
          command: '/ask8ball',
          text: 'Will it rain?',
          user_id: 'U123',
          channel_id: 'C123',
        },
        ack,
      });

      expect(mockDispatcher.dispatch).toHaveBeenCalledWith({
        kind: 'slash_command',
        query: { text: 'Will it rain?', userId: 'U123', channelId: 'C123' },
      });
      expect(ack).toHaveBeenCalledWith({ text: 'Outlook good.' });
    });

    it('should ack without a body when the dispatcher did not handle it', async () => {
      mockDispatcher.dispatch.mockReturnValue({ handled: false });
      const ack = jest.fn().mockResolvedValue(undefined);
      const fn = registeredCommands.get('/ask8ball')!;

      await fn({ command: { text: 'Will it rain?' }, ack });

      expect(ack).toHaveBeenCalledWith(undefined);
    });
  });

  describe('handleAsk', () => {
    it('should return the reply as a slash command response', () => {
      expect(handler.handleAsk({ text: 'Is it?' })).toEqual({
        text: 'Outlook good.',
      });
      expect(mockDispatcher.dispatch).toHaveBeenCalledWith({
        kind: 'slash_command',
        query: { text: 'Is it?', userId: '', channelId: '' },
      });
    });
  });
});
