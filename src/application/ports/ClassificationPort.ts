import { ClassificationRequestDTO, ClassificationResponseDTO } from '../dto/ClassificationDTO.js';

export interface ClassificationPort {
  classify(request: ClassificationRequestDTO, options: { signal: AbortSignal }): Promise<ClassificationResponseDTO>;
}
