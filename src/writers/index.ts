export { SingleFileWriter } from './singleFileWriter';
export { StderrWriter } from './stderrWriter';
