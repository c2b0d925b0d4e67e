import { Module } from '@nestjs/common';
import { DocumentsModule } from '../documents/documents.module';
import { WebSearchModule } from '../web-search/web-search.module';
import { AgentWorkflowFactory } from './agent-workflow.factory';

@Module({
    imports: [DocumentsModule, WebSearchModule],
    providers: [AgentWorkflowFactory],
    exports: [AgentWorkflowFactory],
})
export class AgentModule {}
