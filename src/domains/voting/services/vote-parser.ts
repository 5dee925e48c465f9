export interface ParsedVote {
    vote: boolean;
    shortCode: string;
}

const VOTE_PATTERN = /^(YES|NO)(\d{3,4})$/;

/**
 * "yes007" -> { vote: true, shortCode: '007' }.
 * Anything but an exact YES/NO followed by a 3-4 digit code is rejected.
 */
export function parseVoteMessage(text: string): ParsedVote | null {
    const match = VOTE_PATTERN.exec(text.trim().toUpperCase());
    if (!match) return null;

    return { vote: match[1] === 'YES', shortCode: match[2] };
}
