export {
  INPUT_SOURCE_LAYOUT,
  RIGID_TRANSFORM_LAYOUT,
  VIEW_LAYOUT,
  readInputSource,
  readRigidTransform,
  readView,
  writeInputSource,
  writeRigidTransform,
  writeView,
  writeViews
} from "./layout";
