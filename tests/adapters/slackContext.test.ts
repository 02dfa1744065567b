import {
  createMessageContext,
  expandUserMentions,
  splitArgs,
  unescapeMentions
} from '../../src/adapters/slackContext';

describe('Slack Adapter', () => {
  test('unescapes slash command mentions', () => {
    expect(unescapeMentions('<@U123ABC|bob> and <@U456|carol>')).toBe('@bob and @carol');
  });

  test('splits command text into arguments', () => {
    expect(splitArgs('  <@U123|bob>  ')).toEqual(['@bob']);
    expect(splitArgs('Fried   Rice')).toEqual(['Fried', 'Rice']);
    expect(splitArgs('   ')).toEqual([]);
  });

  test('expands message mentions through users.info', async () => {
    const info = jest.fn(async ({ user }: { user: string }) =>
      user === 'U123' ? { ok: true, user: { name: 'bob' } } : { ok: false, error: 'user_not_found' }
    );
    const client = { users: { info } } as any;
    jest.spyOn(console, 'error').mockImplementation(() => {});

    const text = await expandUserMentions(client, '<@U123> 100 <@U999> 5 <@U123> 2');

    expect(text).toBe('@bob 100 <@U999> 5 @bob 2');
    expect(info).toHaveBeenCalledTimes(2);
    jest.restoreAllMocks();
  });

  test('replies to messages through say', async () => {
    const say = jest.fn().mockResolvedValue(undefined);

    const ctx = createMessageContext('@bob 1', 'alice', say);
    await ctx.reply('done');

    expect(ctx.authorUsername).toBe('alice');
    expect(ctx.commandArgs).toEqual([]);
    expect(say).toHaveBeenCalledWith('done');
  });
});
