export {
  PipelineBuilder,
  createPipeline,
  compose,
  branch,
  forKinds,
  forTypes,
} from './builder';
