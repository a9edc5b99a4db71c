/**
 * comparebar demo - a hospital comparison chart
 *
 * Usage: npm run example
 */

import { PlotBuilder, safeCompareBar } from '../src/index.ts';

const hospitals = [
  { inst: 'Tawau HF', share: 71, patients: 2088 },
  { inst: 'Kota HF', share: 64, patients: 1510 },
  { inst: 'Lahad HF', share: 5, patients: 130 },
  { inst: 'Sandakan HF', share: 58, patients: 1744 },
  { inst: 'National', share: 66, patients: 9120 },
];

console.log('=== Comparison bar chart ===\n');

const chart = new PlotBuilder(hospitals).compareBar('inst', 'share', {
  compareTarget: 'Nation',
  countField: 'patients',
  aimValue: 70,
  title: 'Share treated within 4 hours',
  ylabel: 'Percent',
});

chart.print();

await chart.toFile('compare-bar-demo.svg');
console.log('\n✅ Wrote compare-bar-demo.svg');

const vegaSvg = await chart.toVegaLiteSVG();
console.log(`✅ Vega rendering: ${vegaSvg.length} characters`);

// Errors come back as values from the safe variant
const failed = safeCompareBar(hospitals, 'inst', undefined);
if (!failed.ok) {
  console.log(`\n${failed.error.format()}`);
}
