export interface OutputConfig {
  results_dir: string;
  log_dir: string;
  tmp_dir: string;
}
