enum SearchAlgorithm {
  Linear = 'Linear',
  Kmp = 'Kmp',
  Bmh = 'Bmh',
}
export { SearchAlgorithm };
