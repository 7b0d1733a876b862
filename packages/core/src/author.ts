export type Author = {
  readonly name: string;
  readonly email?: string;
};

/**
 * "Ada Lovelace <ada@example.com>", or just the name without an email
 */
export const formatAuthor = (author: Author): string =>
  author.email ? `${author.name} <${author.email}>` : author.name;
