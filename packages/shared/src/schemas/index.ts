export {
  captureStateSchema,
  type CaptureStateInput,
} from './capture'

export {
  pointsQuerySchema,
  type PointsQuery,
} from './points'

export {
  frameMetadataSchema,
  displayOrientationSchema,
  type FrameMetadata,
  type DisplayOrientationName,
} from './frame'
