// neo-blessed is a fork of blessed with the same API; reuse its typings.
declare module "neo-blessed" {
  import * as blessed from "blessed";
  export = blessed;
}
