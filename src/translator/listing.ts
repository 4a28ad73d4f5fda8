/**
 * Numbered listings of translated instructions, as shown to users and
 * saved to disk.
 */

export function formatListing(instructions: readonly string[]): string[] {
  return instructions.map((instruction, i) => `${i + 1}. ${instruction}`);
}

export function listingText(instructions: readonly string[]): string {
  return formatListing(instructions).join('\n');
}

export function listingFileName(variable: string): string {
  return `rtl_instructions_${variable}.txt`;
}
