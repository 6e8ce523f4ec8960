import path from 'path';
import { INVALID_FILENAME_CHARS } from '../config/constants';

export type NameCleaner = (fileName: string) => string;

function splitName(fileName: string): { stem: string; extension: string } {
  const extension = path.extname(fileName);
  return { stem: fileName.slice(0, fileName.length - extension.length), extension };
}

/**
 * "My Book: Part 1.pdf" -> "My_Book_Part_1.pdf"
 */
export function cleanBookName(fileName: string): string {
  const { stem, extension } = splitName(fileName);
  const cleaned = stem.replace(INVALID_FILENAME_CHARS, '').trim().replace(/\s+/g, '_');
  return cleaned ? cleaned + extension : fileName;
}

/**
 * Strip invalid characters and collapse runs of whitespace
 */
export function cleanStandardName(fileName: string): string {
  const { stem, extension } = splitName(fileName);
  const cleaned = stem.replace(INVALID_FILENAME_CHARS, '').replace(/\s+/g, ' ').trim();
  return cleaned ? cleaned + extension : fileName;
}
