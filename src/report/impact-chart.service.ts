import { Inject, Injectable } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import _ from 'lodash';
import { Constants } from '../constants';
import { LoggingService } from '../common/logging.service';
import { ReportWriteError } from '../common/errors/monitor-errors';
import { ImpactSummary } from '../impact/models/impact.model';
import { ChartConfig, ChartDefinition } from './models/chart-data.dto';

const CHART_JS_URL = 'https://cdn.jsdelivr.net/npm/chart.js';

/**
 * Builds the environmental impact visualization
 *
 * The document is a single HTML page that loads Chart.js and embeds two
 * chart definitions:
 * - Pie chart of produced energy vs grid energy displaced (kWh)
 * - Bar chart of CO2 avoided (kg)
 */
@Injectable()
export class ImpactChartService {
  private readonly context = ImpactChartService.name;

  constructor(@Inject(LoggingService) private readonly logger: LoggingService) {}

  public buildChartConfigs(summary: ImpactSummary): ChartDefinition[] {
    const energyChart: ChartConfig = {
      type: 'pie',
      data: {
        labels: ['Solar Energy Produced', 'Grid Energy Displaced'],
        datasets: [
          {
            data: [_.round(summary.energyKWh, 3), _.round(summary.gridEnergyDisplacedKWh, 3)],
            backgroundColor: ['#FFA500', '#DDDDDD']
          }
        ]
      },
      options: { responsive: true, plugins: { title: { display: true, text: 'Energy Production (kWh)' } } }
    };

    const co2Chart: ChartConfig = {
      type: 'bar',
      data: {
        labels: ['CO2 Emissions Avoided'],
        datasets: [
          {
            data: [_.round(summary.co2AvoidedKg, 3)],
            backgroundColor: ['#4BC0C0']
          }
        ]
      },
      options: { responsive: true, plugins: { title: { display: true, text: 'CO2 Savings (kg)' } } }
    };

    return [
      { canvasId: 'energyChart', config: energyChart },
      { canvasId: 'co2Chart', config: co2Chart }
    ];
  }

  public renderDocument(summary: ImpactSummary): string {
    const charts = this.buildChartConfigs(summary);
    const canvases = charts
      .map(chart => `        <div class="chart-container">\n            <canvas id="${chart.canvasId}"></canvas>\n        </div>`)
      .join('\n');
    // `<` escaped so chart labels can never close the script element
    const chartJson = JSON.stringify(charts).replace(/</g, '\\u003c');

    return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>Solar Energy Environmental Impact</title>
    <script src="${CHART_JS_URL}"></script>
    <style>
        .dashboard { display: flex; flex-wrap: wrap; gap: 20px; }
        .chart-container { width: 45%; min-width: 300px; }
    </style>
</head>
<body>
    <h1>Solar Energy Environmental Impact</h1>
    <div class="dashboard">
${canvases}
    </div>
    <script>
        const charts = ${chartJson};
        charts.forEach(function (chart) {
            new Chart(document.getElementById(chart.canvasId), chart.config);
        });
    </script>
</body>
</html>
`;
  }

  /**
   * Writes the visualization document
   * @param {ImpactSummary} summary - Figures to chart
   * @param {string} filePath - Target file (default REPORT_HTML_FILE in the working directory)
   * @returns {Promise<string>} Absolute path of the written file
   * @throws {ReportWriteError} When the file cannot be written
   */
  public async writeDocument(summary: ImpactSummary, filePath: string = Constants.REPORT.HTML_FILE): Promise<string> {
    const resolvedPath = path.resolve(filePath);

    try {
      await fs.promises.writeFile(resolvedPath, this.renderDocument(summary), 'utf8');
    } catch (error) {
      this.logger.error('Failed to write visualization document', error, this.context);
      throw new ReportWriteError('Failed to write visualization document', resolvedPath, error);
    }

    this.logger.log(`Generated visualization: ${resolvedPath}`, this.context);
    return resolvedPath;
  }
}
