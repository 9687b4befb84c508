import { InvalidContentError, InvalidPostIdError, InvalidTitleError } from '../common/errors';

export type PostFields = {
  title: string;
  content: string;
};

export function validatePostFields(title: string, content: string): PostFields {
  const titleTrimmed = title.trim();
  const contentTrimmed = content.trim();

  if (!titleTrimmed) throw new InvalidTitleError();
  if (!contentTrimmed) throw new InvalidContentError();

  return { title: titleTrimmed, content: contentTrimmed };
}

export function validatePostId(id: string): string {
  const trimmed = id.trim();
  if (!trimmed) throw new InvalidPostIdError();
  return trimmed;
}
