export {
  type RouteOrder,
  type RouteSearchOptions,
  roomDoorways,
  routeSearch,
} from "./route-search";
