import { validationSchema } from '../validation.schema';

describe('validationSchema', () => {
  const hybridEnv = {
    SLACK_BOT_TOKEN: 'xoxb-test',
    SLACK_APP_TOKEN: 'xapp-test',
    SLACK_SIGNING_SECRET: 'test-secret',
  };

  function messages(env: Record<string, string>): string[] {
    const { error } = validationSchema.validate(env, { abortEarly: false });
    return error ? error.details.map((d) => d.message) : [];
  }

  it('should apply defaults', () => {
    const { error, value } = validationSchema.validate(hybridEnv);
    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      TRANSPORT_MODE: 'hybrid',
      HTTP_PORT: 8080,
      SLASH_COMMAND_PATH: '/ask8ball',
      SIGNATURE_MAX_AGE_SECONDS: 300,
      LOG_LEVEL: 'info',
    });
  });

  it('should require the bot token in every mode', () => {
    expect(
      messages({ TRANSPORT_MODE: 'http', SLACK_SIGNING_SECRET: 'test-secret' }),
    ).toEqual([
      'SLACK_BOT_TOKEN is required. Get it from https://api.slack.com/apps',
    ]);
  });

  it('should reject a bot token with the wrong prefix', () => {
    expect(messages({ ...hybridEnv, SLACK_BOT_TOKEN: 'xapp-test' })).toEqual([
      'SLACK_BOT_TOKEN must start with "xoxb-"',
    ]);
  });

  it('should require both secrets in hybrid mode', () => {
    const errors = messages({ SLACK_BOT_TOKEN: 'xoxb-test' });
    expect(errors).toHaveLength(2);
    expect(errors).toEqual(
      expect.arrayContaining([
        'SLACK_APP_TOKEN is required for socket and hybrid transport modes.',
        'SLACK_SIGNING_SECRET is required for http and hybrid transport modes.',
      ]),
    );
  });

  it('should only require the app token in socket mode', () => {
    expect(
      messages({
        TRANSPORT_MODE: 'socket',
        SLACK_BOT_TOKEN: 'xoxb-test',
        SLACK_APP_TOKEN: 'xapp-test',
      }),
    ).toEqual([]);
  });

  it('should only require the signing secret in http mode', () => {
    expect(
      messages({
        TRANSPORT_MODE: 'http',
        SLACK_BOT_TOKEN: 'xoxb-test',
        SLACK_SIGNING_SECRET: 'test-secret',
      }),
    ).toEqual([]);
  });

  it('should reject an unknown transport mode', () => {
    const { error } = validationSchema.validate({
      ...hybridEnv,
      TRANSPORT_MODE: 'carrier-pigeon',
    });
    expect(error?.details[0].path).toEqual(['TRANSPORT_MODE']);
  });

  it('should convert numeric strings and reject out-of-range ports', () => {
    expect(
      validationSchema.validate({ ...hybridEnv, HTTP_PORT: '3000' }).value
        .HTTP_PORT,
    ).toBe(3000);
    const { error } = validationSchema.validate({
      ...hybridEnv,
      HTTP_PORT: '70000',
    });
    expect(error?.details[0].path).toEqual(['HTTP_PORT']);
  });

  it('should allow unknown keys', () => {
    const { error } = validationSchema.validate({ ...hybridEnv, PATH: '/bin' });
    expect(error).toBeUndefined();
  });
});
