export const RESPONSE_POOL = Symbol('RESPONSE_POOL');

export type ResponsePool = readonly string[];

export const MAGIC_RESPONSES: ResponsePool = Object.freeze([
  'Signs point to no.',
  'Yes.',
  'Reply hazy, try again.',
  'Without a doubt.',
  'My sources say no.',
  'As I see it, yes.',
  'You may rely on it.',
  'Concentrate and ask again.',
  'Outlook not so good.',
  'It is decidedly so.',
  'Better not tell you now.',
  'Very doubtful.',
  'Yes - definitely.',
  'It is certain.',
  'Cannot predict now.',
  'Most likely.',
  'Ask again later.',
  'My reply is no.',
  'Outlook good.',
  "Don't count on it.",
]);
