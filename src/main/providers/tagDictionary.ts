import { stripDiacritics } from '../../common/text';
import dictionary from './data/tagDictionary.json';

const CATEGORY_BY_EXTENSION = new Map<string, string>(
  Object.entries(dictionary.extensionCategories).flatMap(([category, extensions]) =>
    extensions.map((extension): [string, string] => [extension, category]),
  ),
);

export const KEYWORD_TAGS: ReadonlyMap<string, string> = new Map(Object.entries(dictionary.keywordTags));
export const COMMON_DIRECTORY_NAMES: ReadonlySet<string> = new Set(dictionary.commonDirectoryNames);
const STOP_WORDS: ReadonlySet<string> = new Set(dictionary.stopWords);

const MIN_TOKEN_LENGTH = 2;
const MAX_TOKEN_LENGTH = 30;

export const categoryForExtension = (extension: string): string | undefined =>
  CATEGORY_BY_EXTENSION.get(extension.toLowerCase());

const splitCamelCase = (value: string) =>
  value.replace(/([a-z0-9])([A-Z])/g, '$1 $2').replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2');

/**
 * Splits a file or directory name into lowercase tokens: delimiters, then
 * camelCase boundaries. Pure numbers and stop words are dropped.
 */
export const tokenizeName = (value: string): string[] =>
  stripDiacritics(value)
    .split(/[\s_.-]+/)
    .map((part) => part.replace(/[^A-Za-z0-9]/g, ''))
    .flatMap((part) => splitCamelCase(part).split(' '))
    .map((token) => token.toLowerCase())
    .filter(
      (token) =>
        token.length >= MIN_TOKEN_LENGTH &&
        token.length <= MAX_TOKEN_LENGTH &&
        !/^\d+$/.test(token) &&
        !STOP_WORDS.has(token),
    );

export const tokenizeContent = (content: string): string[] =>
  stripDiacritics(content)
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
