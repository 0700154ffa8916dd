/**
 * DEPENDENCIES
 * Consumed by: GlossaryTerm.tsx
 * Consumes: nothing
 * Risk-sensitive: NO
 * Notes: Plain English definitions — no jargon. Max 2 sentences each.
 */

export const GLOSSARY: Record<string, string> = {
  'Tick size': 'The smallest price step the instrument can move. A stock might move in $0.01 steps, a futures contract in $0.25 steps.',
  'Tick value': 'How many dollars one tick is worth for one lot. Multiply by ticks moved and lots held to get the dollar move.',
  Lot: 'One unit of position size. Contracts, shares or coins depending on what you trade.',
  'Risk:Reward': 'Reward divided by risk, written as 1:N. 1:2 means you stand to make twice what you could lose.',
  Rebate: 'A per-lot credit paid back to you, usually for adding liquidity. It offsets transaction costs.',
  'Stop-loss': 'A pre-set price where you exit a losing trade to limit damage. Here it is the Max Against Price.',
};
