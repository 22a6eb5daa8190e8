// Lower-kebab-case ASCII slug: accents folded, punctuation dropped, whitespace and dashes collapsed
export const slugify = (label: string): string =>
  label
    .normalize('NFKD')
    .replace(/[^\x00-\x7F]/g, '')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
