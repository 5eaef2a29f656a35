export default {
  baseUrl: 'http://localhost:8080',
  testDir: './test',
  filePattern: '\\.(suite|probe)\\.',
  // seconds
  timeout: 100,
  iterations: 1,
  // milliseconds
  sleep: 0,
  filter: '',
  verbose: false,
};
