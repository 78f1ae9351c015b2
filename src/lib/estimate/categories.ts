import type { EstimateCategory } from '../../types/estimate';

export function mapCategories<T>(fn: (category: EstimateCategory) => T): Record<EstimateCategory, T> {
  return {
    Earthwork: fn('Earthwork'),
    'Erosion Control': fn('Erosion Control'),
    'Storm Drainage': fn('Storm Drainage'),
    'Sanitary Sewer': fn('Sanitary Sewer'),
    Water: fn('Water'),
    'Paving & Concrete': fn('Paving & Concrete'),
    'Striping & Signage': fn('Striping & Signage'),
    'Fencing & Misc': fn('Fencing & Misc'),
  };
}
