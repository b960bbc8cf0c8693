export { TaggedEntity } from "./entity";
