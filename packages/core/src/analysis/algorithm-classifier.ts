/**
 * Algorithm Classifier
 *
 * Turns a feature summary into human-readable technique labels. Pattern
 * hints give the structural tags; a keyword table over the names used in
 * the code gives the named algorithms and data structures.
 */

import type { FeatureSummary } from './types.js';

/**
 * Substring of a function or identifier name → label.
 */
export const NAME_LABELS: ReadonlyArray<readonly [keyword: string, label: string]> = [
  ['binary_search', 'Binary Search'],
  ['binarysearch', 'Binary Search'],
  ['quick_sort', 'Quick Sort'],
  ['quicksort', 'Quick Sort'],
  ['merge_sort', 'Merge Sort'],
  ['mergesort', 'Merge Sort'],
  ['bubble_sort', 'Bubble Sort'],
  ['bubblesort', 'Bubble Sort'],
  ['insertion_sort', 'Insertion Sort'],
  ['insertionsort', 'Insertion Sort'],
  ['selection_sort', 'Selection Sort'],
  ['selectionsort', 'Selection Sort'],
  ['heap_sort', 'Heap Sort'],
  ['heapsort', 'Heap Sort'],
  ['factorial', 'Math/Factorial'],
  ['fibonacci', 'Dynamic Programming / Fibonacci'],
  ['dfs', 'Depth-First Search'],
  ['bfs', 'Breadth-First Search'],
  ['dijkstra', "Dijkstra's Algorithm"],
  ['linkedlist', 'Linked List'],
  ['linked_list', 'Linked List'],
  ['stack', 'Stack'],
  ['queue', 'Queue'],
  ['tree', 'Tree Structure'],
  ['graph', 'Graph Structure'],
  ['hash_map', 'Hash Map'],
  ['hashmap', 'Hash Map'],
];

export const STACK_QUEUE_OPERATIONS = 'Stack/Queue Operations';

export function classifyAlgorithms(features: FeatureSummary): string[] {
  const labels = new Set<string>();
  const { hints } = features;

  if (features.recursion) labels.add('Recursion');
  if (features.nestedLoops) {
    labels.add('Nested Loops');
  } else if (features.loops > 0) {
    labels.add('Iterative Logic');
  }
  if (hints.halving) labels.add('Binary Search');
  if (hints.memo) labels.add('Dynamic Programming');
  if (hints.matrix) labels.add('Matrix Operations');
  if (hints.swap) labels.add('Swap Pattern');

  const names = [...features.functionNames, ...features.referencedNames].join(' ');

  for (const [keyword, label] of NAME_LABELS) {
    if (names.includes(keyword)) {
      labels.add(label);
    }
  }

  if (names.includes('append') && names.includes('pop') && !labels.has('Stack') && !labels.has('Queue')) {
    labels.add(STACK_QUEUE_OPERATIONS);
  }

  return [...labels].sort();
}
