// SPDX-License-Identifier: Apache-2.0

export const ClickHouseContainerImageTags = {
  Registry: 'docker.io',
  Image: 'clickhouse/clickhouse-server',
  Tag: 'latest',
} as const;
