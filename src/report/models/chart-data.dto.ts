/**
 * DTO for one Chart.js dataset
 */
export interface ChartDataset {
  data: number[];
  backgroundColor: string[];
}

/**
 * DTO for a Chart.js configuration as embedded in the visualization document
 */
export interface ChartConfig {
  type: 'pie' | 'bar';
  data: {
    labels: string[];
    datasets: ChartDataset[];
  };
  options: {
    responsive: boolean;
    plugins: {
      title: {
        display: boolean;
        text: string;
      };
    };
  };
}

/**
 * DTO for a chart and the canvas it is drawn on
 */
export interface ChartDefinition {
  canvasId: string;
  config: ChartConfig;
}
