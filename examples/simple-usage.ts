/**
 * Simple usage - build a collection and query it
 */

import { createIntervals } from '../packages/core/src/index';

console.log('=== interval-set: basic queries ===\n');

const intervals = createIntervals(0, 40);
intervals.add({ low: 30, high: 35 });
intervals.add({ low: 5, high: 10 });
intervals.add({ low: 8, high: 15 });

console.log('Insertion order:', intervals.items);

console.log('\n1️⃣ Gaps (sorts first)');
console.log(intervals.gaps());
console.log('Now sorted:', intervals.items);

console.log('\n2️⃣ Overlaps');
console.log(intervals.overlapped());

console.log('\n3️⃣ Which intervals contain 9?');
console.log(intervals.findIntervalsForValue(9));

console.log('\n4️⃣ Diagram');
console.log(intervals.print());
