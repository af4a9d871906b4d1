import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsIn, IsInt, Min } from 'class-validator';
import { SelectionStatus } from '../../selection/selection.entity.js';
import type { SelectionDecision } from '../../selection/selection.service.js';

export class UpdateSelectionDto {
  @ApiProperty({ type: [Number], example: [12, 13] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  selectionIds!: number[];

  @ApiProperty({ enum: [SelectionStatus.SELECTED, SelectionStatus.DESELECTED] })
  @IsIn([SelectionStatus.SELECTED, SelectionStatus.DESELECTED])
  status!: SelectionDecision;
}
