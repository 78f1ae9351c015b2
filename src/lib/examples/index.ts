export { loadExampleProject, EXAMPLE_PROJECT } from './exampleProject';
