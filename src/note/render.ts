/**
 * Note Renderer
 *
 * Pure formatting of the Markdown note. Dates are formatted in the local
 * timezone.
 */

export interface NoteContent {
    summary: string;
    tldr: string;
    /** When the recording was created; becomes the date heading */
    createdAt: Date;
    transcript: string;
}

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const pad = (n: number) => n.toString().padStart(2, '0');

/** 2024-01-15 Monday */
export const formatHeadingDate = (date: Date): string => {
    const year = date.getFullYear().toString();
    const month = pad(date.getMonth() + 1);
    const day = pad(date.getDate());
    return `${year}-${month}-${day} ${WEEKDAYS[date.getDay()]}`;
};

/** 20240115 */
export const formatDateStamp = (date: Date): string => {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
};

export const render = ({ summary, tldr, createdAt, transcript }: NoteContent): string => {
    return [
        `## Transcription Summary\n\n${summary}\n\n`,
        `\`\`\`tldr\n${tldr}\n\`\`\`\n\n`,
        `# ${formatHeadingDate(createdAt)}\n\n`,
        `\n\n${transcript}`,
    ].join('');
};
