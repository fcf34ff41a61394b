// src/flavor.ts
// Cosmetic text for the CLI. Nothing here feeds back into a run.

export type Random = () => number;

export const stepLimitMessages = [
    'I gave you a million steps and THIS is what you do?',
    "Congratulations, you've created nothing.",
    'Even the die is tired of rolling.',
    'Infinity called. It wants its loop back.',
    'Your program ran longer than your attention span.',
    'The accumulator begs for mercy.',
    'Did you really think this would terminate?',
    'Step limit reached. Hope was lost long ago.',
] as const;

export const zenKoans = [
    'The unrolled die contains all faces.',
    'In emptiness, the accumulator finds peace.',
    'To BLOOP nothing is to BLOOP everything.',
    'The blank program has already finished. Have you?',
    'No commands, no bugs. Perfection.',
    'The wisest BLOOP program is the one never written.',
] as const;

export const existentialSuffixes = [
    ' (but does it matter?)',
    ' (in the grand scheme of things)',
    ' (or so the die claims)',
    ' (if you even believe in numbers)',
    ' (the void stares back)',
    ' (temporarily)',
] as const;

export const rickRoll = `Never gonna give you up
Never gonna let you down
Never gonna run around and desert you
Never gonna make you cry
Never gonna say goodbye
Never gonna tell a lie and hurt you`;

export const blame = "It's not a bug, it's a BLOOP.";

export const pick = <T>(items: readonly T[], random: Random): T => {
    if (items.length === 0) {
        throw new RangeError('cannot pick from an empty list');
    }
    const i = Math.min(Math.floor(random() * items.length), items.length - 1);
    return items[i];
};

// each O emits exactly one character, so one suffix per character
export const existentialize = (output: string, random: Random): string =>
    Array.from(output, ch => ch + pick(existentialSuffixes, random)).join('');

export const speedrunComment = (elapsedNs: bigint): string => {
    const us = elapsedNs / 1000n;
    const ms = elapsedNs / 1_000_000n;
    if (us < 100n) return 'over before the die even landed';
    if (us < 1000n) return 'blink and you missed it';
    if (ms < 10n) return 'faster than your wifi';
    if (ms < 100n) return 'not bad, not bad';
    if (ms === 420n) return 'nice.';
    if (ms < 1000n) return 'the die took a scenic route';
    return 'are you running this on a potato?';
};
