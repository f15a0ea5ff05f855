// neo-blessed is a maintained fork of blessed and keeps its API.
declare module "neo-blessed" {
  import * as blessed from "blessed";
  export = blessed;
}
