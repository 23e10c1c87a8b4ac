import path from 'node:path';
import { AUDIO_EXTENSIONS, AUDIO_MIME_TYPES, DEFAULT_MIME_TYPE } from '../constants';

const AUDIO_EXTENSION_SET: ReadonlySet<string> = new Set(AUDIO_EXTENSIONS);

export const extensionOf = (filePath: string): string => path.extname(filePath).toLowerCase();

// Case-insensitive: "FOO.MP3" counts as audio.
export const isAudioFile = (filePath: string): boolean => AUDIO_EXTENSION_SET.has(extensionOf(filePath));

export const mimeTypeFor = (filePath: string): string => AUDIO_MIME_TYPES[extensionOf(filePath)] ?? DEFAULT_MIME_TYPE;

export const baseNameWithoutExtension = (filePath: string): string => path.basename(filePath, path.extname(filePath));
