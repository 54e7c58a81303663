/**
 * Read-side queries for stored diabetes records
 */

import { QueryCommand } from "@aws-sdk/lib-dynamodb";
import { isDiabetesRecord } from "../models/index.js";
import type { DiabetesRecord, DiabetesRecordType } from "../models/index.js";
import type { DocClient } from "./client.js";
import { formatDateInTimezone, DATA_TIMEZONE } from "./keys.js";

/**
 * Query records of one type in a time range (both bounds inclusive),
 * oldest first. Uses GSI2 to select the days, then trims to the exact range.
 */
export async function queryRecordsByTypeAndTimeRange(
  docClient: DocClient,
  tableName: string,
  userId: string,
  recordType: DiabetesRecordType,
  startTime: number,
  endTime: number
): Promise<DiabetesRecord[]> {
  const startDate = formatDateInTimezone(startTime, DATA_TIMEZONE);
  const endDate = formatDateInTimezone(endTime, DATA_TIMEZONE);

  const records: DiabetesRecord[] = [];
  let exclusiveStartKey: Record<string, unknown> | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({
        TableName: tableName,
        IndexName: "GSI2",
        KeyConditionExpression: "gsi2pk = :pk AND gsi2sk BETWEEN :start AND :end",
        ExpressionAttributeValues: {
          ":pk": `USR#${userId}#${recordType.toUpperCase()}`,
          ":start": startDate,
          ":end": endDate + "~",
        },
        ExclusiveStartKey: exclusiveStartKey,
        ScanIndexForward: true, // Chronological order
      })
    );

    for (const item of result.Items || []) {
      const data: unknown = item.data;
      if (isDiabetesRecord(data) && data.timestamp >= startTime && data.timestamp <= endTime) {
        records.push(data);
      }
    }

    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return records;
}
