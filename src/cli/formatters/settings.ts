export interface ReporterSettings {
  queryTag?: string;
  chainId: number;
  gasLimit: number;
  gasPrice: number;
  stake: number;
  minNativeTokenBalance: number;
}

export function formatReporterSettings(settings: ReporterSettings): string[] {
  return [
    '',
    settings.queryTag ? `Reporting query tag: ${settings.queryTag}` : 'Reporting with synchronized queries',
    `Current chain ID: ${settings.chainId}`,
    `Gas Limit: ${settings.gasLimit}`,
    `Gas Price: ${settings.gasPrice}`,
    `Desired stake amount: ${settings.stake}`,
    `Minimum KDA token balance required to report: ${settings.minNativeTokenBalance}`,
    '',
  ];
}
