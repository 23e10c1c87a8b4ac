import { describe, it, expect } from 'vitest';
import * as Media from '../../src/util/media';

describe('media', () => {
    describe('isAudioFile', () => {
        it('should recognize every supported extension', () => {
            for (const file of ['a.wav', 'b.mp3', 'c.m4a', 'd.ogg', 'e.flac', 'f.aac']) {
                expect(Media.isAudioFile(`/audio/${file}`)).toBe(true);
            }
        });

        it('should ignore case', () => {
            expect(Media.isAudioFile('/audio/FOO.MP3')).toBe(true);
        });

        it('should reject other files', () => {
            expect(Media.isAudioFile('/audio/readme.txt')).toBe(false);
            expect(Media.isAudioFile('/audio/wav')).toBe(false);
            expect(Media.isAudioFile('/audio/clip.mp3.part')).toBe(false);
        });
    });

    describe('mimeTypeFor', () => {
        it('should map extensions to content types', () => {
            expect(Media.mimeTypeFor('/audio/a.mp3')).toBe('audio/mpeg');
            expect(Media.mimeTypeFor('/audio/a.M4A')).toBe('audio/mp4');
            expect(Media.mimeTypeFor('/audio/a.flac')).toBe('audio/flac');
        });

        it('should default to wav', () => {
            expect(Media.mimeTypeFor('/audio/a.weird')).toBe('audio/wav');
        });
    });

    describe('baseNameWithoutExtension', () => {
        it('should strip directory and extension', () => {
            expect(Media.baseNameWithoutExtension('/audio/meeting.notes.m4a')).toBe('meeting.notes');
        });
    });
});
