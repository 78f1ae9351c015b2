export {
  computeAllocation,
  calcLotCount,
  SQFT_PER_ACRE,
  ROADS_PCT,
  OPEN_SPACE_PCT,
  DETENTION_PCT,
  BUFFERS_PCT,
  NET_DEVELOPABLE_PCT,
} from './allocation';
